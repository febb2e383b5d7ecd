import type { Double } from 'mongodb';

// ============================================================================
// Literals
// ============================================================================

export type Literal =
  | { type: 'integer'; value: number }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }
  | { type: 'boolean'; value: boolean }
  | { type: 'null'; value: null };

export type LiteralValue = Literal['value'];

// ============================================================================
// Predicate tree
// ============================================================================

export type ComparisonOperator = '=' | '!=' | '<' | '<=' | '>' | '>=';

export type LogicalOperator = 'AND' | 'OR';

export interface ComparisonNode {
  readonly kind: 'comparison';
  readonly field: string;
  readonly operator: ComparisonOperator;
  readonly value: Literal;
}

export interface LogicalNode {
  readonly kind: 'logical';
  readonly op: LogicalOperator;
  readonly operands: readonly [Predicate, Predicate, ...Predicate[]];
}

export interface NotNode {
  readonly kind: 'not';
  readonly operand: Predicate;
}

export type Predicate = ComparisonNode | LogicalNode | NotNode;

// ============================================================================
// Statements
// ============================================================================

/** Marker for `SELECT *` */
export const ALL_COLUMNS = '*';

export type SelectTarget = typeof ALL_COLUMNS | readonly string[];

/**
 * Output of the clause splitter. The WHERE clause is kept verbatim along with
 * its offset in the original string so parse errors point into the full query.
 */
export interface QuerySkeleton {
  readonly target: SelectTarget;
  readonly table: string;
  readonly predicateText: string | null;
  readonly predicateOffset: number;
  readonly limit: number | null;
  readonly offset: number | null;
}

export interface Query {
  readonly target: SelectTarget;
  readonly table: string;
  readonly predicate: Predicate | null;
  readonly limit: number | null;
  readonly offset: number | null;
}

// ============================================================================
// Document-store filter
// ============================================================================

/**
 * Filter operand. Float literals render as BSON `Double` so that `1.0` is not
 * stored or matched as an integer.
 */
export type ScalarValue = string | number | boolean | null | Double;

export type ComparisonKey = '$eq' | '$ne' | '$lt' | '$lte' | '$gt' | '$gte';

export type LogicalKey = '$and' | '$or' | '$nor';

export type OperatorExpression = { [K in ComparisonKey]?: ScalarValue };

/**
 * Nested-mapping predicate accepted by a document store's find call.
 * `{}` matches every document.
 */
export interface DocumentFilter {
  [key: string]: ScalarValue | OperatorExpression | DocumentFilter[];
}

export type Projection = Record<string, 0 | 1>;

export interface TranslatedQuery {
  readonly target: SelectTarget;
  readonly table: string;
  readonly filter: DocumentFilter;
  readonly projection: Projection;
  readonly limit: number | null;
  readonly offset: number | null;
}
