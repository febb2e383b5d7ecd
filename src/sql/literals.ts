import { Double } from 'mongodb';
import type { ComparisonOperator, Literal, ScalarValue } from './types.js';

const DATE_LIKE =
  /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export const ORDERING_OPERATORS: ReadonlySet<ComparisonOperator> = new Set(['<', '<=', '>', '>=']);

export function isOrderingOperator(operator: ComparisonOperator): boolean {
  return ORDERING_OPERATORS.has(operator);
}

/**
 * ISO-8601 calendar date, optionally with a time part: `2024-03-01`,
 * `2024-03-01T10:30:00Z`.
 */
export function isDateLike(value: string): boolean {
  return DATE_LIKE.test(value);
}

/**
 * Whether `<`, `<=`, `>`, `>=` may be applied to this literal.
 */
export function supportsOrdering(literal: Literal): boolean {
  switch (literal.type) {
    case 'integer':
    case 'float':
      return true;
    case 'string':
      return isDateLike(literal.value);
    default:
      return false;
  }
}

/**
 * Filter operand for a literal. Floats are wrapped in `Double`.
 */
export function literalToValue(literal: Literal): ScalarValue {
  return literal.type === 'float' ? new Double(literal.value) : literal.value;
}

/**
 * Tag a value coming back out of a document filter. `Double` decodes as a
 * float; plain integral numbers decode as integers.
 */
export function literalFromValue(value: ScalarValue): Literal {
  if (value instanceof Double) {
    return { type: 'float', value: value.value };
  }
  if (value === null) {
    return { type: 'null', value: null };
  }
  if (typeof value === 'boolean') {
    return { type: 'boolean', value };
  }
  if (typeof value === 'string') {
    return { type: 'string', value };
  }
  return Number.isInteger(value) ? { type: 'integer', value } : { type: 'float', value };
}

export function describeLiteral(literal: Literal): string {
  switch (literal.type) {
    case 'string':
      return `'${literal.value.replace(/'/g, "''")}'`;
    case 'null':
      return 'NULL';
    case 'boolean':
      return literal.value ? 'TRUE' : 'FALSE';
    default:
      return String(literal.value);
  }
}
