import { describe, it, expect } from '@jest/globals';
import {
  MAX_AGE,
  MAX_INSERT_BATCH_SIZE,
  MIN_AGE,
  buildUserInsert,
  chunk,
  generateUsers,
  randomName,
  validateInsertBatchSize,
  type RandomSource,
} from '../sampleData.js';

/** Replays the given values in a loop */
function sequence(...values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index++;
    return value;
  };
}

describe('sampleData', () => {
  describe('randomName', () => {
    it('should build lowercase names of the requested length', () => {
      expect(randomName(sequence(0), 3)).toBe('aaa');
      expect(randomName(sequence(0.999), 2)).toBe('zz');
      expect(randomName(sequence(0, 0.5), 4)).toBe('anan');
    });
  });

  describe('generateUsers', () => {
    it('should produce the requested number of users', () => {
      expect(generateUsers(25)).toHaveLength(25);
    });

    it('should keep ages within bounds', () => {
      const [youngest] = generateUsers(1, sequence(0));
      const [oldest] = generateUsers(1, sequence(0.9999));

      expect(youngest).toEqual({ name: 'aaaaaaa', age: MIN_AGE });
      expect(oldest.age).toBe(MAX_AGE);
    });
  });

  describe('chunk', () => {
    it('should split into batches of at most the given size', () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
      expect(chunk([], 3)).toEqual([]);
    });

    it('should reject a non-positive batch size', () => {
      expect(() => chunk([1], 0)).toThrow('Batch size must be a positive integer, got 0');
    });
  });

  describe('buildUserInsert', () => {
    it('should number placeholders per row', () => {
      expect(
        buildUserInsert([
          { name: 'aaaaaaa', age: 20 },
          { name: 'bbbbbbb', age: 30 },
        ])
      ).toEqual({
        text: 'INSERT INTO users (name, age) VALUES ($1, $2), ($3, $4)',
        values: ['aaaaaaa', 20, 'bbbbbbb', 30],
      });
    });

    it('should refuse a batch that exceeds the bind-parameter limit', () => {
      const batch = generateUsers(MAX_INSERT_BATCH_SIZE + 1, () => 0);

      expect(() => buildUserInsert(batch)).toThrow('Batch size must be at most 32767 rows, got 32768');
    });
  });

  describe('validateInsertBatchSize', () => {
    it('should accept sizes up to the bind-parameter limit', () => {
      expect(MAX_INSERT_BATCH_SIZE).toBe(32767);
      expect(() => validateInsertBatchSize(1)).not.toThrow();
      expect(() => validateInsertBatchSize(32767)).not.toThrow();
    });

    it.each([
      [32768, 'Batch size must be at most 32767 rows, got 32768'],
      [0, 'Batch size must be a positive integer, got 0'],
      [NaN, 'Batch size must be a positive integer, got NaN'],
    ])('should reject %p', (size, message) => {
      expect(() => validateInsertBatchSize(size)).toThrow(message);
    });
  });
});
