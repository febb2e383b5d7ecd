/**
 * WHERE-clause Parser
 *
 * Recursive descent parser producing a {@link Predicate} tree with the usual
 * SQL precedence: NOT binds tighter than AND, which binds tighter than OR.
 * Parentheses override precedence and stay visible in the tree as nesting.
 *
 * **Grammar (BNF):**
 * ```
 * Expression := OrExpression
 * OrExpression := AndExpression ('OR' AndExpression)*
 * AndExpression := NotExpression ('AND' NotExpression)*
 * NotExpression := 'NOT' NotExpression | Primary
 * Primary := '(' Expression ')' | Comparison
 * Comparison := Field Operator Literal | Field 'IS' 'NOT'? 'NULL'
 * Operator := '=' | '!=' | '<>' | '<' | '<=' | '>' | '>='
 * Literal := String | Number | 'TRUE' | 'FALSE' | 'NULL'
 * ```
 *
 * A run of the same operator at one level (`a AND b AND c`) becomes a single
 * n-ary node. `LIKE`, `IN`, `BETWEEN`, subqueries and field-to-field
 * comparisons are recognized and rejected with {@link UnsupportedFeatureError}.
 */

import { SqlSyntaxError, UnsupportedFeatureError } from './errors.js';
import { describeLiteral, isOrderingOperator, supportsOrdering } from './literals.js';
import { tokenize, type Token, type TokenType } from './SqlLexer.js';
import type {
  ComparisonNode,
  ComparisonOperator,
  Literal,
  LogicalOperator,
  Predicate,
} from './types.js';

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '!=', '<', '<=', '>', '>=']);

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.has(value);
}

const PATTERN_KEYWORDS: ReadonlySet<string> = new Set(['LIKE', 'ILIKE', 'IN', 'BETWEEN']);

class PredicateParser {
  private current = 0;

  constructor(private readonly tokens: Token[]) {}

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

  private match(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private isKeyword(value: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.type === 'KEYWORD' && token.value === value;
  }

  private describe(token: Token): string {
    return token.type === 'EOF' ? 'end of input' : `'${token.text}'`;
  }

  private error(message: string, token: Token, hint?: string): SqlSyntaxError {
    return new SqlSyntaxError({ message, offset: token.position, clause: 'where', hint });
  }

  parse(): Predicate {
    if (this.match('EOF')) {
      throw this.error('Empty WHERE clause', this.peek());
    }

    const predicate = this.parseOrExpression();

    const trailing = this.peek();
    if (trailing.type !== 'EOF') {
      const message =
        trailing.type === 'RPAREN'
          ? `Unbalanced ')' at offset ${trailing.position}`
          : `Unexpected ${this.describe(trailing)} at offset ${trailing.position}`;
      throw this.error(message, trailing, 'Combine conditions with AND / OR');
    }

    return predicate;
  }

  /**
   * Collect `next (KEYWORD next)*` into one n-ary node, or return the single
   * operand unwrapped.
   */
  private parseChain(op: LogicalOperator, next: () => Predicate): Predicate {
    const first = next();
    const rest: Predicate[] = [];

    while (this.isKeyword(op)) {
      this.advance();
      rest.push(next());
    }

    if (rest.length === 0) {
      return first;
    }

    const [second, ...others] = rest;
    return { kind: 'logical', op, operands: [first, second, ...others] };
  }

  private parseOrExpression(): Predicate {
    return this.parseChain('OR', () => this.parseAndExpression());
  }

  private parseAndExpression(): Predicate {
    return this.parseChain('AND', () => this.parseNotExpression());
  }

  private parseNotExpression(): Predicate {
    if (this.isKeyword('NOT')) {
      this.advance();
      return { kind: 'not', operand: this.parseNotExpression() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Predicate {
    if (this.match('LPAREN')) {
      const open = this.advance();
      if (this.isKeyword('SELECT')) {
        throw new UnsupportedFeatureError('subquery', this.peek().position);
      }

      const expr = this.parseOrExpression();

      if (!this.match('RPAREN')) {
        throw this.error(
          `Expected ')' to close '(' at offset ${open.position} but found ${this.describe(this.peek())}`,
          this.peek(),
          'Check that parentheses are balanced'
        );
      }
      this.advance();
      return expr;
    }

    return this.parseComparison();
  }

  private parseComparison(): ComparisonNode {
    const fieldToken = this.peek();
    if (fieldToken.type !== 'IDENTIFIER') {
      throw this.error(
        `Expected field name but found ${this.describe(fieldToken)}`,
        fieldToken,
        'Conditions have the form field <operator> literal, with the field on the left'
      );
    }
    this.advance();
    const field = fieldToken.value;

    const opToken = this.peek();

    if (opToken.type === 'KEYWORD') {
      if (opToken.value === 'IS') {
        return this.parseNullCheck(field);
      }
      if (PATTERN_KEYWORDS.has(opToken.value)) {
        throw new UnsupportedFeatureError(opToken.value, opToken.position);
      }
      if (opToken.value === 'NOT') {
        const negated = this.peek(1);
        if (negated.type === 'KEYWORD' && PATTERN_KEYWORDS.has(negated.value)) {
          throw new UnsupportedFeatureError(`NOT ${negated.value}`, opToken.position);
        }
      }
    }

    if (opToken.type === 'LPAREN') {
      throw new UnsupportedFeatureError(`function call ${fieldToken.text}()`, fieldToken.position);
    }

    const operator = opToken.value;
    if (opToken.type !== 'OPERATOR' || !isComparisonOperator(operator)) {
      throw this.error(
        `Expected comparison operator after '${field}' but found ${this.describe(opToken)}`,
        opToken,
        'Supported operators are =, !=, <>, <, <=, >, >=, IS NULL, IS NOT NULL'
      );
    }
    this.advance();

    const valueToken = this.peek();
    const value = this.parseLiteral();

    if (value.type === 'null') {
      throw this.error(
        `Comparison '${field} ${opToken.text} NULL' is never true in SQL`,
        valueToken,
        operator === '!=' ? `Use ${field} IS NOT NULL` : `Use ${field} IS NULL`
      );
    }

    if (isOrderingOperator(operator) && !supportsOrdering(value)) {
      throw this.error(
        `Operator ${operator} needs a numeric or date literal, got ${describeLiteral(value)}`,
        valueToken,
        "Dates are written as quoted ISO-8601 strings, e.g. '2024-03-01'"
      );
    }

    return { kind: 'comparison', field, operator, value };
  }

  /**
   * Field 'IS' 'NOT'? 'NULL'
   */
  private parseNullCheck(field: string): ComparisonNode {
    this.advance(); // consume IS

    let operator: ComparisonOperator = '=';
    if (this.isKeyword('NOT')) {
      this.advance();
      operator = '!=';
    }

    const token = this.peek();
    if (!this.isKeyword('NULL')) {
      throw this.error(`Expected NULL after IS but found ${this.describe(token)}`, token);
    }
    this.advance();

    return { kind: 'comparison', field, operator, value: { type: 'null', value: null } };
  }

  private parseNumber(token: Token): Literal {
    if (/^-?\d+$/.test(token.value)) {
      const value = Number(token.value);
      if (!Number.isSafeInteger(value)) {
        throw this.error(`Integer ${token.text} is out of range`, token);
      }
      return { type: 'integer', value };
    }

    const value = Number(token.value);
    if (!Number.isFinite(value)) {
      throw this.error(`Number ${token.text} is out of range`, token);
    }
    return { type: 'float', value };
  }

  private parseLiteral(): Literal {
    const token = this.peek();

    switch (token.type) {
      case 'NUMBER':
        this.advance();
        return this.parseNumber(token);
      case 'STRING':
        this.advance();
        return { type: 'string', value: token.value };
      case 'KEYWORD':
        if (token.value === 'TRUE' || token.value === 'FALSE') {
          this.advance();
          return { type: 'boolean', value: token.value === 'TRUE' };
        }
        if (token.value === 'NULL') {
          this.advance();
          return { type: 'null', value: null };
        }
        break;
      case 'IDENTIFIER':
        throw new UnsupportedFeatureError(
          'field-to-field comparison',
          token.position,
          `Comparing against another field ('${token.text}') is not supported; quote string values`
        );
      case 'LPAREN':
        if (this.isKeyword('SELECT', 1)) {
          throw new UnsupportedFeatureError('subquery', token.position);
        }
        break;
      default:
        break;
    }

    throw this.error(
      `Expected literal value but found ${this.describe(token)}`,
      token,
      "Literals are strings ('text'), numbers (42, 3.5), TRUE, FALSE or NULL"
    );
  }
}

/**
 * Parse WHERE-clause text into a predicate tree.
 *
 * @param text - Condition text without the WHERE keyword
 * @param baseOffset - Offset of `text` inside the full query, so error offsets
 *   point into the original string
 * @throws {SqlSyntaxError} malformed condition
 * @throws {UnsupportedFeatureError} LIKE, IN, BETWEEN, subqueries
 */
export function parsePredicate(text: string, baseOffset = 0): Predicate {
  return new PredicateParser(tokenize(text, baseOffset)).parse();
}
