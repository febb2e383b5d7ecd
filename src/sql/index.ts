export * from './types.js';
export * from './errors.js';
export { tokenize, type Token, type TokenType } from './SqlLexer.js';
export { splitClauses } from './ClauseSplitter.js';
export { parsePredicate } from './PredicateParser.js';
export { renderFilter, renderProjection, OPERATOR_KEYS, OPERATORS_BY_KEY } from './FilterRenderer.js';
export { decodeFilter } from './FilterDecoder.js';
export { parseQuery, translateSql, tryTranslateSql, type TranslationResult } from './SqlTranslator.js';
