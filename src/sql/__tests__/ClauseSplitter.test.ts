import { describe, it, expect } from '@jest/globals';
import { splitClauses } from '../ClauseSplitter.js';
import { SqlSyntaxError, UnsupportedFeatureError } from '../errors.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}

describe('splitClauses', () => {
  describe('valid statements', () => {
    it('should split the minimal statement', () => {
      expect(splitClauses('SELECT * FROM users')).toEqual({
        target: '*',
        table: 'users',
        predicateText: null,
        predicateOffset: -1,
        limit: null,
        offset: null,
      });
    });

    it('should keep column order and record the WHERE offset', () => {
      const skeleton = splitClauses('select Name, age from Users where age > 30 limit 10');

      expect(skeleton).toEqual({
        target: ['Name', 'age'],
        table: 'Users',
        predicateText: 'age > 30',
        predicateOffset: 34,
        limit: 10,
        offset: null,
      });
    });

    it('should accept dotted column names', () => {
      expect(splitClauses('SELECT address.city FROM people').target).toEqual(['address.city']);
    });

    it('should keep WHERE text verbatim, including whitespace', () => {
      const skeleton = splitClauses('SELECT * FROM t WHERE  a =  1   AND b <> 2');

      expect(skeleton.predicateText).toBe('a =  1   AND b <> 2');
    });

    it('should not end WHERE at keywords inside string literals', () => {
      const skeleton = splitClauses("SELECT * FROM t WHERE name = 'LIMIT 5'");

      expect(skeleton.predicateText).toBe("name = 'LIMIT 5'");
      expect(skeleton.limit).toBeNull();
    });

    it('should keep parenthesized groups in the WHERE text', () => {
      const skeleton = splitClauses('SELECT * FROM t WHERE (a = 1 OR b = 2) LIMIT 5');

      expect(skeleton.predicateText).toBe('(a = 1 OR b = 2)');
      expect(skeleton.limit).toBe(5);
    });

    it('should distinguish LIMIT 0 from no LIMIT', () => {
      expect(splitClauses('SELECT * FROM t LIMIT 0').limit).toBe(0);
      expect(splitClauses('SELECT * FROM t').limit).toBeNull();
    });

    it('should accept LIMIT and OFFSET in either order', () => {
      const a = splitClauses('SELECT * FROM t LIMIT 10 OFFSET 20');
      const b = splitClauses('SELECT * FROM t OFFSET 20 LIMIT 10');

      expect([a.limit, a.offset]).toEqual([10, 20]);
      expect([b.limit, b.offset]).toEqual([10, 20]);
    });

    it('should accept a single trailing semicolon', () => {
      expect(splitClauses('SELECT * FROM t WHERE a = 1;').predicateText).toBe('a = 1');
      expect(splitClauses('SELECT * FROM t LIMIT 3 ;').limit).toBe(3);
    });
  });

  describe('statement errors', () => {
    it('should reject an empty query', () => {
      const error = captureError(() => splitClauses('   '));

      expect(error).toBeInstanceOf(SqlSyntaxError);
      expect(error).toMatchObject({ message: 'Empty query', offset: 3, clause: 'statement' });
    });

    it('should reject non-SELECT statements as unsupported', () => {
      const error = captureError(() => splitClauses('DELETE FROM users'));

      expect(error).toBeInstanceOf(UnsupportedFeatureError);
      expect(error).toMatchObject({
        feature: 'DELETE statement',
        message: 'Only SELECT statements can be translated; got DELETE',
        offset: 0,
      });
    });

    it('should reject statements that do not start with SELECT', () => {
      expect(() => splitClauses('FETCH users')).toThrow("Expected SELECT but found 'FETCH'");
    });

    it('should reject a second statement', () => {
      const error = captureError(() => splitClauses('SELECT * FROM t; SELECT 1'));

      expect(error).toMatchObject({ message: "Unexpected 'SELECT' at offset 17", offset: 17 });
    });
  });

  describe('target and FROM errors', () => {
    it('should reject DISTINCT', () => {
      const error = captureError(() => splitClauses('SELECT DISTINCT a FROM t'));

      expect(error).toBeInstanceOf(UnsupportedFeatureError);
      expect(error).toMatchObject({ feature: 'DISTINCT', offset: 7 });
    });

    it('should reject function calls in the target list', () => {
      const error = captureError(() => splitClauses('SELECT COUNT(*) FROM t'));

      expect(error).toMatchObject({
        kind: 'UnsupportedFeature',
        feature: 'function call COUNT()',
        offset: 7,
      });
    });

    it('should reject column aliases', () => {
      const error = captureError(() => splitClauses('SELECT a AS b FROM t'));

      expect(error).toMatchObject({ feature: 'column alias', offset: 9 });
    });

    it('should reject a missing column list', () => {
      expect(() => splitClauses('SELECT FROM t')).toThrow("Expected column name but found 'FROM'");
    });

    it('should reject a missing FROM', () => {
      expect(() => splitClauses('SELECT * t')).toThrow("Expected FROM but found 't'");
    });

    it('should reject a missing table name', () => {
      expect(() => splitClauses('SELECT * FROM')).toThrow(
        'Expected table name but found end of query'
      );
    });

    it('should reject several tables', () => {
      const error = captureError(() => splitClauses('SELECT * FROM a, b'));

      expect(error).toMatchObject({
        message: 'Multiple tables in FROM are not supported',
        offset: 15,
        clause: 'from',
      });
    });

    it('should reject joins', () => {
      expect(() => splitClauses('SELECT * FROM a JOIN b ON a.id = b.id')).toThrow(
        'Unsupported clause: JOIN'
      );
      expect(() => splitClauses('SELECT * FROM a LEFT JOIN b ON a.id = b.id')).toThrow(
        'Unsupported clause: JOIN'
      );
    });

    it('should reject subqueries in FROM', () => {
      const error = captureError(() => splitClauses('SELECT * FROM (SELECT * FROM t)'));

      expect(error).toMatchObject({ kind: 'UnsupportedFeature', feature: 'subquery', offset: 14 });
    });
  });

  describe('WHERE and paging errors', () => {
    it('should reject an empty WHERE clause', () => {
      const error = captureError(() => splitClauses('SELECT * FROM t WHERE'));

      expect(error).toMatchObject({ message: 'Empty WHERE clause', offset: 21, clause: 'where' });
    });

    it('should reject WHERE followed directly by LIMIT', () => {
      expect(() => splitClauses('SELECT * FROM t WHERE LIMIT 5')).toThrow('Empty WHERE clause');
    });

    it('should reject negative LIMIT', () => {
      expect(() => splitClauses('SELECT * FROM t LIMIT -5')).toThrow(
        'LIMIT must be non-negative, got -5'
      );
    });

    it('should reject fractional LIMIT', () => {
      expect(() => splitClauses('SELECT * FROM t LIMIT 1.5')).toThrow(
        'LIMIT must be an integer, got 1.5'
      );
    });

    it('should reject a non-numeric LIMIT', () => {
      expect(() => splitClauses('SELECT * FROM t LIMIT abc')).toThrow(
        "LIMIT expects a non-negative integer but found 'abc'"
      );
      expect(() => splitClauses('SELECT * FROM t LIMIT')).toThrow(
        'LIMIT expects a non-negative integer but found end of query'
      );
    });

    it('should reject repeated paging clauses', () => {
      expect(() => splitClauses('SELECT * FROM t LIMIT 1 LIMIT 2')).toThrow(
        'LIMIT may only appear once'
      );
      expect(() => splitClauses('SELECT * FROM t OFFSET 1 OFFSET 2')).toThrow(
        'OFFSET may only appear once'
      );
    });

    it('should name unsupported trailing clauses', () => {
      const error = captureError(() => splitClauses('SELECT * FROM t ORDER BY a'));

      expect(error).toMatchObject({ message: 'Unsupported clause: ORDER BY', offset: 16 });
      expect(() => splitClauses('SELECT * FROM t WHERE a = 1 GROUP BY a')).toThrow(
        'Unsupported clause: GROUP BY'
      );
      expect(() => splitClauses('SELECT * FROM t LIMIT 5 UNION SELECT * FROM u')).toThrow(
        'Unsupported clause: UNION'
      );
    });

    it('should reject trailing tokens', () => {
      const error = captureError(() => splitClauses('SELECT * FROM t LIMIT 5 extra'));

      expect(error).toMatchObject({ message: "Unexpected 'extra' at offset 24", offset: 24 });
    });
  });
});
