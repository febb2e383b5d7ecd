/**
 * Gate for SQL sent verbatim to the relational store.
 *
 * The speed test runs the caller's SQL as written, including queries the
 * translator rejects (`BETWEEN`, `LIKE`, ...). This check keeps that path to
 * one plain SELECT: no second statement, no comments, no dollar-quoted or
 * backslash-escaped strings that could hide a `;` from the scan.
 */

import { SqlSyntaxError, UnsupportedFeatureError } from './errors.js';

const LEADING_WORD = /^\s*([A-Za-z_]+)/;

/**
 * @throws {UnsupportedFeatureError} anything other than a single SELECT
 * @throws {SqlSyntaxError} comments or quoting the scan cannot follow
 */
export function assertSingleSelect(sql: string): void {
  const leading = LEADING_WORD.exec(sql);
  if (!leading) {
    throw new SqlSyntaxError({
      message: 'Expected a SELECT statement',
      offset: sql.length - sql.trimStart().length,
      clause: 'statement',
    });
  }

  const keyword = leading[1].toUpperCase();
  if (keyword !== 'SELECT') {
    throw new UnsupportedFeatureError(
      `${keyword} statement`,
      leading[0].length - leading[1].length,
      `Only SELECT statements run against the relational store; got ${keyword}`
    );
  }

  let quote: "'" | '"' | null = null;

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];
    const next = sql[i + 1];

    if (char === '\\') {
      throw new SqlSyntaxError({
        message: 'Backslashes are not allowed in relational queries',
        offset: i,
        clause: 'statement',
      });
    }

    if (quote) {
      if (char === quote) {
        if (next === quote) {
          i++;
        } else {
          quote = null;
        }
      }
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
    } else if ((char === '-' && next === '-') || (char === '/' && next === '*')) {
      throw new SqlSyntaxError({
        message: 'Comments are not allowed in relational queries',
        offset: i,
        clause: 'statement',
      });
    } else if (char === '$') {
      throw new SqlSyntaxError({
        message: 'Dollar-quoted strings and parameters are not allowed in relational queries',
        offset: i,
        clause: 'statement',
      });
    } else if (char === ';' && sql.slice(i + 1).trim() !== '') {
      throw new UnsupportedFeatureError(
        'multiple statements',
        i,
        'Only one statement may run against the relational store'
      );
    }
  }

  if (quote) {
    throw new SqlSyntaxError({
      message: 'Unterminated quoted text',
      offset: sql.length,
      clause: 'statement',
    });
  }
}
