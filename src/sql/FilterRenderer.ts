/**
 * Renders predicate trees into MongoDB-style filter documents.
 *
 * ```
 * a = 1                      → { a: 1 }
 * a > 1                      → { a: { $gt: 1 } }
 * a = 1 AND (b > 2 OR c = 3) → { $and: [{ a: 1 }, { $or: [{ b: { $gt: 2 } }, { c: 3 }] }] }
 * NOT a = 1                  → { $nor: [{ a: 1 }] }
 * a = 1.0                    → { a: Double(1) }
 * ```
 *
 * Rendering is a pure function of the tree. Trees that break the predicate
 * invariants raise {@link TranslationInvariantViolation}.
 */

import { TranslationInvariantViolation } from './errors.js';
import { isOrderingOperator, literalToValue, supportsOrdering } from './literals.js';
import { IDENTIFIER_PATTERN } from './SqlLexer.js';
import {
  ALL_COLUMNS,
  type ComparisonKey,
  type ComparisonNode,
  type ComparisonOperator,
  type DocumentFilter,
  type LogicalNode,
  type OperatorExpression,
  type Predicate,
  type Projection,
  type SelectTarget,
} from './types.js';

/**
 * SQL comparison operator → document-store operator key. One-to-one; the
 * inverse table below must stay in sync.
 */
export const OPERATOR_KEYS: Readonly<Record<ComparisonOperator, ComparisonKey>> = {
  '=': '$eq',
  '!=': '$ne',
  '<': '$lt',
  '<=': '$lte',
  '>': '$gt',
  '>=': '$gte',
};

export const OPERATORS_BY_KEY: Readonly<Record<ComparisonKey, ComparisonOperator>> = {
  $eq: '=',
  $ne: '!=',
  $lt: '<',
  $lte: '<=',
  $gt: '>',
  $gte: '>=',
};

function renderComparison(node: ComparisonNode): DocumentFilter {
  const { field, operator, value } = node;

  if (!IDENTIFIER_PATTERN.test(field)) {
    throw new TranslationInvariantViolation(`invalid field name '${field}'`);
  }

  const key: ComparisonKey | undefined = OPERATOR_KEYS[operator];
  if (!key) {
    throw new TranslationInvariantViolation(`unknown comparison operator '${operator}'`);
  }

  if (isOrderingOperator(operator) && !supportsOrdering(value)) {
    throw new TranslationInvariantViolation(
      `operator ${operator} applied to ${value.type} literal on '${field}'`
    );
  }

  const operand = literalToValue(value);
  if (operator === '=') {
    return { [field]: operand };
  }
  const expression: OperatorExpression = {};
  expression[key] = operand;
  return { [field]: expression };
}

function renderLogical(node: LogicalNode): DocumentFilter {
  if (node.operands.length < 2) {
    throw new TranslationInvariantViolation(
      `${node.op} node with ${node.operands.length} operand(s)`
    );
  }

  const rendered = node.operands.map(renderNode);
  return node.op === 'AND' ? { $and: rendered } : { $or: rendered };
}

function renderNode(node: Predicate): DocumentFilter {
  switch (node.kind) {
    case 'comparison':
      return renderComparison(node);
    case 'logical':
      return renderLogical(node);
    case 'not':
      return { $nor: [renderNode(node.operand)] };
    default: {
      const unknown: never = node;
      throw new TranslationInvariantViolation(`unknown predicate node ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Render a predicate tree, or `{}` (match everything) when there is none.
 */
export function renderFilter(predicate: Predicate | null): DocumentFilter {
  return predicate ? renderNode(predicate) : {};
}

/**
 * Projection for a SELECT target list. `_id` is always hidden, matching what
 * the relational side returns.
 */
export function renderProjection(target: SelectTarget): Projection {
  if (target === ALL_COLUMNS) {
    return { _id: 0 };
  }

  const projection: Projection = {};
  for (const column of target) {
    projection[column] = 1;
  }
  projection._id = 0;
  return projection;
}
