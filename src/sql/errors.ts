/**
 * Error taxonomy for SQL translation.
 *
 * Every failure raised while splitting, parsing or rendering a query is one of
 * the subclasses below. Callers that prefer values over exceptions can use
 * {@link toTranslationFailure} to turn a caught error into a tagged failure.
 */

export type SqlClause = 'statement' | 'select' | 'from' | 'where' | 'limit' | 'offset';

/**
 * Base class for all translator errors.
 */
export abstract class SqlTranslationError extends Error {
  /** Character offset into the full query string, when known */
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = new.target.name;
    this.offset = offset;

    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Malformed input, or grammar this translator does not accept.
 */
export class SqlSyntaxError extends SqlTranslationError {
  public readonly kind = 'SyntaxError' as const;

  /** Clause the offending token belongs to */
  public readonly clause?: SqlClause;

  /** Human-readable troubleshooting hint */
  public readonly hint?: string;

  constructor(options: { message: string; offset: number; clause?: SqlClause; hint?: string }) {
    super(options.message, options.offset);
    this.clause = options.clause;
    this.hint = options.hint;
  }
}

/**
 * A construct the translator recognizes but deliberately does not translate.
 */
export class UnsupportedFeatureError extends SqlTranslationError {
  public readonly kind = 'UnsupportedFeature' as const;

  public readonly feature: string;

  constructor(feature: string, offset: number, message?: string) {
    super(message ?? `Unsupported feature: ${feature}`, offset);
    this.feature = feature;
  }
}

/**
 * The renderer was handed a tree that breaks the predicate invariants.
 * Seeing one of these is a defect in the parser, not bad user input.
 */
export class TranslationInvariantViolation extends SqlTranslationError {
  constructor(message: string) {
    super(`Translation invariant violated: ${message}`, -1);
  }
}

export type TranslationFailure =
  | { kind: 'SyntaxError'; message: string; offset: number; hint?: string }
  | { kind: 'UnsupportedFeature'; feature: string; message: string; offset: number };

/**
 * Convert a caught error into the tagged failure handed to callers.
 * Invariant violations and foreign errors are rethrown.
 */
export function toTranslationFailure(error: unknown): TranslationFailure {
  if (error instanceof SqlSyntaxError) {
    return {
      kind: 'SyntaxError',
      message: error.message,
      offset: error.offset,
      ...(error.hint ? { hint: error.hint } : {}),
    };
  }

  if (error instanceof UnsupportedFeatureError) {
    return {
      kind: 'UnsupportedFeature',
      feature: error.feature,
      message: error.message,
      offset: error.offset,
    };
  }

  throw error;
}
