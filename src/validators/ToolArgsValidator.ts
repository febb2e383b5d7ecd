export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validates MCP tool arguments, which arrive as untyped JSON.
 */
export class ToolArgsValidator {
  private static readonly MAX_QUERY_LENGTH = 100_000;

  /**
   * Require a non-blank `query` string.
   *
   * @throws ValidationError if missing, not a string, blank or oversized
   */
  static requireQuery(args: Record<string, unknown> | undefined): string {
    const query = args?.query;

    if (query === undefined) {
      throw new ValidationError('Missing required argument "query"');
    }
    if (typeof query !== 'string') {
      throw new ValidationError(`Argument "query" must be a string, got ${typeof query}`);
    }
    if (query.trim() === '') {
      throw new ValidationError('Argument "query" must not be empty');
    }
    if (query.length > this.MAX_QUERY_LENGTH) {
      throw new ValidationError(
        `Argument "query" is too long (${query.length} characters, max ${this.MAX_QUERY_LENGTH})`
      );
    }

    return query;
  }

  /**
   * Read an optional positive integer argument.
   *
   * @throws ValidationError if present but not a positive integer
   */
  static optionalPositiveInt(
    args: Record<string, unknown> | undefined,
    name: string
  ): number | undefined {
    const value = args?.[name];

    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new ValidationError(`Argument "${name}" must be a positive integer`);
    }

    return value;
  }
}
