/**
 * Clause Splitter
 *
 * Partitions a `SELECT ... FROM ... [WHERE ...] [LIMIT n] [OFFSET n]` statement
 * into a {@link QuerySkeleton}. The WHERE clause is not parsed here: its text is
 * cut out verbatim, together with its offset, for the predicate parser.
 *
 * **Grammar:**
 * ```
 * Statement := 'SELECT' Target 'FROM' Identifier Where? Paging* ';'? EOF
 * Target    := '*' | Identifier (',' Identifier)*
 * Where     := 'WHERE' <any tokens up to the next clause keyword at depth 0>
 * Paging    := ('LIMIT' | 'OFFSET') UnsignedInteger
 * ```
 *
 * Anything outside this shape fails loudly: a clause the translator does not
 * handle is never silently dropped.
 */

import { SqlSyntaxError, UnsupportedFeatureError, type SqlClause } from './errors.js';
import { tokenize, type Token, type TokenType } from './SqlLexer.js';
import { ALL_COLUMNS, type QuerySkeleton, type SelectTarget } from './types.js';

const NON_SELECT_STATEMENTS: ReadonlySet<string> = new Set(['INSERT', 'UPDATE', 'DELETE', 'WITH']);

const JOIN_KEYWORDS: ReadonlySet<string> = new Set([
  'JOIN',
  'INNER',
  'LEFT',
  'RIGHT',
  'FULL',
  'CROSS',
  'NATURAL',
]);

/** Keywords that end the WHERE clause when seen outside parentheses */
const CLAUSE_BOUNDARIES: ReadonlySet<string> = new Set([
  'WHERE',
  'LIMIT',
  'OFFSET',
  'GROUP',
  'ORDER',
  'HAVING',
  'UNION',
  'INTERSECT',
  'EXCEPT',
  'FETCH',
  ...JOIN_KEYWORDS,
]);

const UNSUPPORTED_CLAUSES: ReadonlySet<string> = new Set([
  'GROUP',
  'ORDER',
  'HAVING',
  'UNION',
  'INTERSECT',
  'EXCEPT',
  'FETCH',
  ...JOIN_KEYWORDS,
]);

class ClauseSplitter {
  private current = 0;

  constructor(
    private readonly sql: string,
    private readonly tokens: Token[]
  ) {}

  private peek(ahead = 0): Token {
    const index = Math.min(this.current + ahead, this.tokens.length - 1);
    return this.tokens[index];
  }

  private advance(): Token {
    const token = this.peek();
    if (this.current < this.tokens.length - 1) {
      this.current++;
    }
    return token;
  }

  private isKeyword(value: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.type === 'KEYWORD' && token.value === value;
  }

  private match(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private describe(token: Token): string {
    return token.type === 'EOF' ? 'end of query' : `'${token.text}'`;
  }

  private error(clause: SqlClause, message: string, token: Token, hint?: string): SqlSyntaxError {
    return new SqlSyntaxError({ message, offset: token.position, clause, hint });
  }

  /**
   * Name of an unsupported clause starting at the current token, e.g. `ORDER BY`.
   */
  private clauseName(): string {
    const keyword = this.peek().value;
    if ((keyword === 'GROUP' || keyword === 'ORDER') && this.isKeyword('BY', 1)) {
      return `${keyword} BY`;
    }
    if (JOIN_KEYWORDS.has(keyword)) {
      return 'JOIN';
    }
    return keyword;
  }

  split(): QuerySkeleton {
    this.parseStatementStart();
    const target = this.parseTarget();
    const table = this.parseFrom();
    const where = this.parseWhere();
    const paging = this.parsePaging();
    this.parseEnd();

    return {
      target,
      table,
      predicateText: where?.text ?? null,
      predicateOffset: where?.offset ?? -1,
      limit: paging.limit,
      offset: paging.offset,
    };
  }

  private parseStatementStart(): void {
    const token = this.peek();

    if (token.type === 'EOF') {
      throw this.error('statement', 'Empty query', token, 'Provide a SELECT statement');
    }

    if (token.type === 'KEYWORD' && NON_SELECT_STATEMENTS.has(token.value)) {
      throw new UnsupportedFeatureError(
        `${token.value} statement`,
        token.position,
        `Only SELECT statements can be translated; got ${token.value}`
      );
    }

    if (!this.isKeyword('SELECT')) {
      throw this.error('statement', `Expected SELECT but found ${this.describe(token)}`, token);
    }
    this.advance();
  }

  private parseTarget(): SelectTarget {
    if (this.isKeyword('DISTINCT')) {
      throw new UnsupportedFeatureError('DISTINCT', this.peek().position);
    }

    if (this.match('STAR')) {
      this.advance();
      return ALL_COLUMNS;
    }

    const columns: string[] = [];
    while (true) {
      const token = this.peek();
      if (token.type !== 'IDENTIFIER') {
        throw this.error(
          'select',
          `Expected column name but found ${this.describe(token)}`,
          token,
          'Use * or a comma-separated list of column names'
        );
      }
      this.advance();

      if (this.match('LPAREN')) {
        throw new UnsupportedFeatureError(
          `function call ${token.text}()`,
          token.position,
          `Aggregates and function calls are not supported: ${token.text}()`
        );
      }
      if (this.isKeyword('AS')) {
        throw new UnsupportedFeatureError('column alias', this.peek().position);
      }

      columns.push(token.value);

      if (!this.match('COMMA')) {
        break;
      }
      this.advance();
    }

    return columns;
  }

  private parseFrom(): string {
    const fromToken = this.peek();
    if (!this.isKeyword('FROM')) {
      throw this.error('select', `Expected FROM but found ${this.describe(fromToken)}`, fromToken);
    }
    this.advance();

    const token = this.peek();
    if (token.type === 'LPAREN') {
      throw new UnsupportedFeatureError('subquery', token.position, 'Subqueries in FROM are not supported');
    }
    if (token.type !== 'IDENTIFIER') {
      throw this.error('from', `Expected table name but found ${this.describe(token)}`, token);
    }
    this.advance();

    const next = this.peek();
    if (next.type === 'COMMA') {
      throw this.error(
        'from',
        'Multiple tables in FROM are not supported',
        next,
        'Query a single table; joins cannot be translated'
      );
    }
    if (next.type === 'KEYWORD' && JOIN_KEYWORDS.has(next.value)) {
      throw this.error('from', 'Unsupported clause: JOIN', next, 'Query a single table');
    }

    return token.value;
  }

  private parseWhere(): { text: string; offset: number } | null {
    if (!this.isKeyword('WHERE')) {
      return null;
    }
    const whereToken = this.advance();
    const first = this.peek();

    let depth = 0;
    let last: Token | null = null;
    while (true) {
      const token = this.peek();
      if (token.type === 'EOF' || token.type === 'SEMICOLON') {
        break;
      }
      if (depth === 0 && token.type === 'KEYWORD' && CLAUSE_BOUNDARIES.has(token.value)) {
        break;
      }
      if (token.type === 'LPAREN') {
        depth++;
      } else if (token.type === 'RPAREN' && depth > 0) {
        depth--;
      }
      last = this.advance();
    }

    if (!last) {
      throw new SqlSyntaxError({
        message: 'Empty WHERE clause',
        offset: whereToken.end,
        clause: 'where',
        hint: 'Add a condition after WHERE or remove the keyword',
      });
    }

    return {
      text: this.sql.slice(first.position, last.end),
      offset: first.position,
    };
  }

  private parseCount(clause: 'limit' | 'offset'): number {
    const keyword = this.advance();
    const token = this.peek();
    const name = keyword.value;

    if (token.type !== 'NUMBER') {
      throw this.error(
        clause,
        `${name} expects a non-negative integer but found ${this.describe(token)}`,
        token
      );
    }
    if (token.value.startsWith('-')) {
      throw this.error(clause, `${name} must be non-negative, got ${token.text}`, token);
    }
    if (!/^\d+$/.test(token.value)) {
      throw this.error(clause, `${name} must be an integer, got ${token.text}`, token);
    }

    const count = Number(token.value);
    if (!Number.isSafeInteger(count)) {
      throw this.error(clause, `${name} value ${token.text} is too large`, token);
    }

    this.advance();
    return count;
  }

  private parsePaging(): { limit: number | null; offset: number | null } {
    let limit: number | null = null;
    let offset: number | null = null;

    while (this.isKeyword('LIMIT') || this.isKeyword('OFFSET')) {
      const token = this.peek();
      if (token.value === 'LIMIT') {
        if (limit !== null) {
          throw this.error('limit', 'LIMIT may only appear once', token);
        }
        limit = this.parseCount('limit');
      } else {
        if (offset !== null) {
          throw this.error('offset', 'OFFSET may only appear once', token);
        }
        offset = this.parseCount('offset');
      }
    }

    return { limit, offset };
  }

  private parseEnd(): void {
    if (this.match('SEMICOLON')) {
      this.advance();
    }

    const token = this.peek();
    if (token.type === 'EOF') {
      return;
    }

    if (token.type === 'KEYWORD' && UNSUPPORTED_CLAUSES.has(token.value)) {
      const name = this.clauseName();
      throw this.error('statement', `Unsupported clause: ${name}`, token, `${name} cannot be translated`);
    }

    throw this.error(
      'statement',
      `Unexpected ${this.describe(token)} at offset ${token.position}`,
      token,
      'Clauses must appear in the order SELECT, FROM, WHERE, LIMIT/OFFSET'
    );
  }
}

/**
 * Split a SQL statement into its clauses.
 *
 * @throws {SqlSyntaxError} malformed statement or unsupported clause
 * @throws {UnsupportedFeatureError} non-SELECT statement, DISTINCT, function
 * calls or subqueries
 */
export function splitClauses(sql: string): QuerySkeleton {
  return new ClauseSplitter(sql, tokenize(sql)).split();
}
