import { splitClauses } from './ClauseSplitter.js';
import { toTranslationFailure, type TranslationFailure } from './errors.js';
import { renderFilter, renderProjection } from './FilterRenderer.js';
import { parsePredicate } from './PredicateParser.js';
import type { Query, TranslatedQuery } from './types.js';
import { debugLog } from '../utils/logger.js';

export type TranslationResult =
  | { ok: true; query: TranslatedQuery }
  | { ok: false; error: TranslationFailure };

/**
 * Split and parse a SQL statement into its intermediate representation.
 */
export function parseQuery(sql: string): Query {
  const skeleton = splitClauses(sql);
  const predicate =
    skeleton.predicateText === null
      ? null
      : parsePredicate(skeleton.predicateText, skeleton.predicateOffset);

  return {
    target: skeleton.target,
    table: skeleton.table,
    predicate,
    limit: skeleton.limit,
    offset: skeleton.offset,
  };
}

/**
 * Translate a SQL statement into a document-store query.
 *
 * @throws {SqlSyntaxError} malformed or unsupported grammar
 * @throws {UnsupportedFeatureError} recognized construct with no translation
 */
export function translateSql(sql: string): TranslatedQuery {
  const query = parseQuery(sql);

  const translated: TranslatedQuery = {
    target: query.target,
    table: query.table,
    filter: renderFilter(query.predicate),
    projection: renderProjection(query.target),
    limit: query.limit,
    offset: query.offset,
  };

  debugLog('translator', 'translated query', {
    table: translated.table,
    filter: translated.filter,
    limit: translated.limit,
    offset: translated.offset,
  });

  return translated;
}

/**
 * Like {@link translateSql}, but reports user-facing failures as a value.
 * Invariant violations still throw: they are defects, not bad input.
 */
export function tryTranslateSql(sql: string): TranslationResult {
  try {
    return { ok: true, query: translateSql(sql) };
  } catch (error) {
    const failure = toTranslationFailure(error);
    debugLog('translator', 'translation rejected', { sql, failure });
    return { ok: false, error: failure };
  }
}
