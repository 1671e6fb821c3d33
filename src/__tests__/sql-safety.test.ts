import { describe, it, expect } from 'vitest';
import { sanitizeSql } from '../services/sql-safety.js';
import { SQLValidationError } from '../types/errors.js';

function rejection(sql: string, maxRows: number): SQLValidationError {
  try {
    sanitizeSql(sql, maxRows);
  } catch (error) {
    if (error instanceof SQLValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected "${sql}" to be rejected`);
}

describe('sanitizeSql', () => {
  describe('row cap', () => {
    it('appends the cap when no LIMIT is present', () => {
      expect(sanitizeSql('SELECT id, name FROM customers', 5)).toBe(
        'SELECT id, name FROM customers LIMIT 5'
      );
    });

    it('keeps a LIMIT under the cap unchanged', () => {
      expect(sanitizeSql('SELECT id FROM customers LIMIT 10', 50)).toBe(
        'SELECT id FROM customers LIMIT 10'
      );
    });

    it('keeps a LIMIT equal to the cap', () => {
      expect(sanitizeSql('select * from orders limit 3', 3)).toBe('select * from orders limit 3');
    });

    it('rejects a LIMIT over the cap, naming both values', () => {
      const error = rejection('SELECT id FROM customers LIMIT 9999', 100);
      expect(error.message).toBe('Queries are limited to 100 rows; requested 9999.');
      expect(error.stage).toBe('validate_sql');
    });

    it('matches LIMIT case-insensitively', () => {
      expect(rejection('SELECT id FROM customers LiMiT 11', 10).message).toBe(
        'Queries are limited to 10 rows; requested 11.'
      );
    });

    it('reads LIMIT-like text inside a string literal (lexical check)', () => {
      expect(rejection("SELECT 'limit 500' AS note", 10).message).toBe(
        'Queries are limited to 10 rows; requested 500.'
      );
    });
  });

  describe('statement allow-list', () => {
    it('rejects non-SELECT statements', () => {
      const error = rejection('DELETE FROM customers', 200);
      expect(error.message).toBe('Only SELECT statements are permitted.');
      expect(error.stage).toBe('validate_sql');
    });

    it('rejects statements that do not start with SELECT', () => {
      expect(rejection('WITH recent AS (SELECT 1) SELECT * FROM recent', 10).message).toBe(
        'Only SELECT statements are permitted.'
      );
    });

    it('rejects empty and whitespace-only text', () => {
      expect(rejection('', 10).message).toBe('SQL text cannot be empty.');
      expect(rejection('  \n\t ', 10).message).toBe('SQL text cannot be empty.');
    });

    it('accepts lowercase select with surrounding whitespace', () => {
      expect(sanitizeSql('   select name from products  ', 20)).toBe(
        'select name from products LIMIT 20'
      );
    });
  });

  describe('terminators', () => {
    it('drops a single trailing semicolon', () => {
      expect(sanitizeSql('SELECT 1;', 10)).toBe('SELECT 1 LIMIT 10');
      expect(sanitizeSql('  select 1 ;  ', 10)).toBe('select 1 LIMIT 10');
    });

    it('rejects stacked statements', () => {
      expect(rejection('SELECT 1; DROP TABLE customers', 10).message).toBe(
        'Multiple SQL statements are not allowed.'
      );
    });

    it('rejects a doubled trailing terminator', () => {
      expect(rejection('SELECT 1;;', 10).message).toBe('Multiple SQL statements are not allowed.');
    });
  });

  it('is idempotent for a fixed cap', () => {
    const inputs = [
      'SELECT id FROM customers',
      'SELECT id FROM customers LIMIT 4;',
      '  select count(*) from orders where status = \'completed\'  ',
    ];
    for (const input of inputs) {
      const once = sanitizeSql(input, 7);
      expect(sanitizeSql(once, 7)).toBe(once);
    }
  });

  it('rejects a cap that is not a positive integer', () => {
    expect(() => sanitizeSql('SELECT 1', 0)).toThrow(RangeError);
    expect(() => sanitizeSql('SELECT 1', -5)).toThrow(RangeError);
    expect(() => sanitizeSql('SELECT 1', 2.5)).toThrow('max_rows must be a positive integer.');
  });
});
