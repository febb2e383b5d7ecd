/**
 * SQL Lexer
 *
 * Turns a query string (or a slice of one) into positioned tokens. Keywords
 * are matched case-insensitively on whole words only, so a keyword spelled
 * inside a string literal or as part of a longer identifier never misfires.
 *
 * @remarks
 * **Token vocabulary:**
 * - Identifiers: `name`, `address.city` (dotted paths address nested fields)
 * - Strings: `'text'` or `"text"`; the quote character is escaped by doubling it
 * - Numbers: `42`, `-7`, `3.14`, `1e6`, `2.5E-3`
 * - Operators: `=`, `!=`, `<>` (normalized to `!=`), `<`, `<=`, `>`, `>=`
 * - Punctuation: `,`, `*`, `(`, `)`, `;`
 *
 * Comments (`--`, `/* *\/`) are rejected rather than skipped.
 *
 * All positions are absolute: when lexing a slice, pass the slice's offset in
 * the original query as `baseOffset`.
 */

import { SqlSyntaxError } from './errors.js';

export type TokenType =
  | 'KEYWORD'
  | 'IDENTIFIER'
  | 'STRING'
  | 'NUMBER'
  | 'OPERATOR'
  | 'COMMA'
  | 'STAR'
  | 'LPAREN'
  | 'RPAREN'
  | 'SEMICOLON'
  | 'EOF';

export interface Token {
  type: TokenType;
  /** Normalized value: upper-cased keyword, unescaped string, operator symbol */
  value: string;
  /** Source text as written */
  text: string;
  position: number;
  end: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'SELECT',
  'DISTINCT',
  'AS',
  'FROM',
  'WHERE',
  'LIMIT',
  'OFFSET',
  'AND',
  'OR',
  'NOT',
  'IS',
  'NULL',
  'TRUE',
  'FALSE',
  'LIKE',
  'ILIKE',
  'IN',
  'BETWEEN',
  'GROUP',
  'ORDER',
  'BY',
  'HAVING',
  'JOIN',
  'INNER',
  'LEFT',
  'RIGHT',
  'FULL',
  'CROSS',
  'NATURAL',
  'UNION',
  'INTERSECT',
  'EXCEPT',
  'FETCH',
  'WITH',
  'INSERT',
  'UPDATE',
  'DELETE',
]);

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

const WHITESPACE = /\s/;
const DIGIT = /[0-9]/;
const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_.]/;

const PUNCTUATION: Partial<Record<string, TokenType>> = {
  ',': 'COMMA',
  '*': 'STAR',
  '(': 'LPAREN',
  ')': 'RPAREN',
  ';': 'SEMICOLON',
};

export class SqlLexer {
  private pos = 0;

  constructor(
    private readonly input: string,
    private readonly baseOffset = 0
  ) {}

  private peek(ahead = 0): string {
    return this.input[this.pos + ahead] ?? '';
  }

  private at(localPos: number): number {
    return this.baseOffset + localPos;
  }

  private token(type: TokenType, value: string, start: number): Token {
    return {
      type,
      value,
      text: this.input.slice(start, this.pos),
      position: this.at(start),
      end: this.at(this.pos),
    };
  }

  private readString(quote: string): string {
    const start = this.pos;
    this.pos++; // opening quote

    let value = '';
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (ch === quote) {
        if (this.peek(1) === quote) {
          value += quote;
          this.pos += 2;
          continue;
        }
        this.pos++; // closing quote
        return value;
      }
      value += ch;
      this.pos++;
    }

    throw new SqlSyntaxError({
      message: `Unterminated string literal starting at offset ${this.at(start)}`,
      offset: this.at(start),
      hint: `Close the string with ${quote}; write ${quote}${quote} for a literal ${quote}`,
    });
  }

  private readDigits(): void {
    while (DIGIT.test(this.peek())) {
      this.pos++;
    }
  }

  private invalidNumber(start: number): SqlSyntaxError {
    while (IDENTIFIER_PART.test(this.peek())) {
      this.pos++;
    }
    const text = this.input.slice(start, this.pos);
    return new SqlSyntaxError({
      message: `Invalid number format: ${text}`,
      offset: this.at(start),
      hint: 'Numbers look like 42, -7, 3.14 or 1e6',
    });
  }

  private readNumber(): void {
    const start = this.pos;
    if (this.peek() === '-') {
      this.pos++;
    }
    this.readDigits();

    if (this.peek() === '.') {
      this.pos++;
      if (!DIGIT.test(this.peek())) {
        throw this.invalidNumber(start);
      }
      this.readDigits();
    }

    if (this.peek() === 'e' || this.peek() === 'E') {
      this.pos++;
      if (this.peek() === '+' || this.peek() === '-') {
        this.pos++;
      }
      if (!DIGIT.test(this.peek())) {
        throw this.invalidNumber(start);
      }
      this.readDigits();
    }

    if (IDENTIFIER_PART.test(this.peek())) {
      throw this.invalidNumber(start);
    }
  }

  private readWord(): string {
    const start = this.pos;
    while (IDENTIFIER_PART.test(this.peek())) {
      this.pos++;
    }
    const word = this.input.slice(start, this.pos);

    if (word.includes('.') && !IDENTIFIER_PATTERN.test(word)) {
      throw new SqlSyntaxError({
        message: `Invalid identifier '${word}'`,
        offset: this.at(start),
        hint: 'Dotted field paths need a name on both sides of every dot, e.g. address.city',
      });
    }
    return word;
  }

  private readOperator(start: number): Token | null {
    const ch = this.peek();
    const next = this.peek(1);

    if (ch === '=') {
      this.pos++;
      return this.token('OPERATOR', '=', start);
    }
    if (ch === '!' && next === '=') {
      this.pos += 2;
      return this.token('OPERATOR', '!=', start);
    }
    if (ch === '<') {
      if (next === '>') {
        this.pos += 2;
        return this.token('OPERATOR', '!=', start);
      }
      if (next === '=') {
        this.pos += 2;
        return this.token('OPERATOR', '<=', start);
      }
      this.pos++;
      return this.token('OPERATOR', '<', start);
    }
    if (ch === '>') {
      if (next === '=') {
        this.pos += 2;
        return this.token('OPERATOR', '>=', start);
      }
      this.pos++;
      return this.token('OPERATOR', '>', start);
    }
    return null;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (this.pos < this.input.length) {
      const ch = this.peek();

      if (WHITESPACE.test(ch)) {
        this.pos++;
        continue;
      }

      const start = this.pos;

      if ((ch === '-' && this.peek(1) === '-') || (ch === '/' && this.peek(1) === '*')) {
        throw new SqlSyntaxError({
          message: `SQL comments are not supported (offset ${this.at(start)})`,
          offset: this.at(start),
          hint: 'Remove the comment from the query',
        });
      }

      if (ch === "'" || ch === '"') {
        const value = this.readString(ch);
        tokens.push(this.token('STRING', value, start));
        continue;
      }

      if (DIGIT.test(ch) || (ch === '-' && DIGIT.test(this.peek(1)))) {
        this.readNumber();
        tokens.push(this.token('NUMBER', this.input.slice(start, this.pos), start));
        continue;
      }

      if (IDENTIFIER_START.test(ch)) {
        const word = this.readWord();
        const upper = word.toUpperCase();
        if (KEYWORDS.has(upper)) {
          tokens.push(this.token('KEYWORD', upper, start));
        } else {
          tokens.push(this.token('IDENTIFIER', word, start));
        }
        continue;
      }

      const punctuationType = PUNCTUATION[ch];
      if (punctuationType) {
        this.pos++;
        tokens.push(this.token(punctuationType, ch, start));
        continue;
      }

      const operator = this.readOperator(start);
      if (operator) {
        tokens.push(operator);
        continue;
      }

      throw new SqlSyntaxError({
        message: `Unexpected character '${ch}' at offset ${this.at(start)}`,
        offset: this.at(start),
        hint: 'Supported operators are =, !=, <>, <, <=, >, >=',
      });
    }

    tokens.push({
      type: 'EOF',
      value: '',
      text: '',
      position: this.at(this.pos),
      end: this.at(this.pos),
    });
    return tokens;
  }
}

/**
 * Tokenize `input`, reporting positions relative to `baseOffset`.
 */
export function tokenize(input: string, baseOffset = 0): Token[] {
  return new SqlLexer(input, baseOffset).tokenize();
}
