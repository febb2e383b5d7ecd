export interface SampleUser {
  name: string;
  age: number;
}

export const MIN_AGE = 18;
export const MAX_AGE = 90;
export const NAME_LENGTH = 7;

/** PostgreSQL caps a statement at 65535 bind parameters; each user row binds two */
export const MAX_INSERT_BATCH_SIZE = Math.floor(65_535 / 2);

const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomName(random: RandomSource = Math.random, length = NAME_LENGTH): string {
  let name = '';
  for (let i = 0; i < length; i++) {
    name += LOWERCASE[Math.floor(random() * LOWERCASE.length)];
  }
  return name;
}

/**
 * Generate `count` users with a lowercase name and an age between 18 and 90 inclusive.
 */
export function generateUsers(count: number, random: RandomSource = Math.random): SampleUser[] {
  const users: SampleUser[] = [];
  for (let i = 0; i < count; i++) {
    users.push({ name: randomName(random), age: randomInt(random, MIN_AGE, MAX_AGE) });
  }
  return users;
}

/**
 * Split rows into consecutive batches of at most `size`.
 */
export function chunk<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * @throws Error unless `size` is a positive integer no larger than {@link MAX_INSERT_BATCH_SIZE}
 */
export function validateInsertBatchSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }
  if (size > MAX_INSERT_BATCH_SIZE) {
    throw new Error(`Batch size must be at most ${MAX_INSERT_BATCH_SIZE} rows, got ${size}`);
  }
}

/**
 * Build a parameterised multi-row INSERT for the users table.
 */
export function buildUserInsert(batch: SampleUser[]): { text: string; values: Array<string | number> } {
  if (batch.length > MAX_INSERT_BATCH_SIZE) {
    throw new Error(`Batch size must be at most ${MAX_INSERT_BATCH_SIZE} rows, got ${batch.length}`);
  }

  const placeholders: string[] = [];
  const values: Array<string | number> = [];

  batch.forEach((user, index) => {
    placeholders.push(`($${index * 2 + 1}, $${index * 2 + 2})`);
    values.push(user.name, user.age);
  });

  return {
    text: `INSERT INTO users (name, age) VALUES ${placeholders.join(', ')}`,
    values,
  };
}
