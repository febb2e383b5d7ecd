import { Double } from 'mongodb';
import { UnsupportedFeatureError } from './errors.js';
import { OPERATORS_BY_KEY } from './FilterRenderer.js';
import { literalFromValue } from './literals.js';
import type {
  ComparisonKey,
  DocumentFilter,
  OperatorExpression,
  Predicate,
  ScalarValue,
} from './types.js';

const COMPARISON_KEYS: ReadonlySet<string> = new Set(Object.keys(OPERATORS_BY_KEY));

function isComparisonKey(key: string): key is ComparisonKey {
  return COMPARISON_KEYS.has(key);
}

function notInvertible(what: string): UnsupportedFeatureError {
  return new UnsupportedFeatureError(what, -1, `Filter cannot be decoded: ${what}`);
}

function combine(predicates: Predicate[]): Predicate {
  const [first, second, ...others] = predicates;
  if (!first) {
    throw notInvertible('empty filter');
  }
  return second ? { kind: 'logical', op: 'AND', operands: [first, second, ...others] } : first;
}

function decodeList(key: string, value: ScalarValue | OperatorExpression | DocumentFilter[]): Predicate[] {
  if (!Array.isArray(value)) {
    throw notInvertible(`${key} expects an array of filters`);
  }
  return value.map((filter) => {
    const predicate = decodeFilter(filter);
    if (!predicate) {
      throw notInvertible(`empty filter inside ${key}`);
    }
    return predicate;
  });
}

function decodeLogical(
  key: string,
  value: ScalarValue | OperatorExpression | DocumentFilter[]
): Predicate {
  const operands = decodeList(key, value);

  if (key === '$nor') {
    const [only, second, ...others] = operands;
    if (!only) {
      throw notInvertible('$nor with no operands');
    }
    if (!second) {
      return { kind: 'not', operand: only };
    }
    return { kind: 'not', operand: { kind: 'logical', op: 'OR', operands: [only, second, ...others] } };
  }

  const [first, second, ...others] = operands;
  if (!first || !second) {
    throw notInvertible(`${key} with fewer than two operands`);
  }
  return { kind: 'logical', op: key === '$and' ? 'AND' : 'OR', operands: [first, second, ...others] };
}

function decodeField(field: string, value: ScalarValue | OperatorExpression | DocumentFilter[]): Predicate {
  if (Array.isArray(value)) {
    throw notInvertible(`array value for field '${field}'`);
  }

  if (value === null || typeof value !== 'object' || value instanceof Double) {
    return { kind: 'comparison', field, operator: '=', value: literalFromValue(value) };
  }

  const comparisons: Predicate[] = [];
  for (const [key, operand] of Object.entries(value)) {
    if (!isComparisonKey(key)) {
      throw notInvertible(`operator ${key} on field '${field}'`);
    }
    if (operand === undefined) {
      continue;
    }
    comparisons.push({
      kind: 'comparison',
      field,
      operator: OPERATORS_BY_KEY[key],
      value: literalFromValue(operand),
    });
  }
  return combine(comparisons);
}

/**
 * Inverse of {@link renderFilter}: rebuild a predicate tree from a filter.
 *
 * Besides the renderer's own output this accepts implicit conjunctions
 * (`{ a: 1, b: 2 }` and `{ a: { $gt: 1, $lt: 5 } }`), which decode to AND
 * nodes in key order. Returns `null` for the match-all filter `{}`.
 *
 * @throws {UnsupportedFeatureError} operators outside the rendered vocabulary
 */
export function decodeFilter(filter: DocumentFilter): Predicate | null {
  const entries = Object.entries(filter);
  if (entries.length === 0) {
    return null;
  }

  const predicates = entries.map(([key, value]) => {
    if (key === '$and' || key === '$or' || key === '$nor') {
      return decodeLogical(key, value);
    }
    if (key.startsWith('$')) {
      throw notInvertible(`operator ${key}`);
    }
    return decodeField(key, value);
  });

  return combine(predicates);
}
