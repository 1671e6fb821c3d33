/**
 * Read-only safety checks for generated SQL.
 *
 * This is a lexical allow-list, not a parser: it only guarantees that the
 * text starts with SELECT, holds a single statement and carries a row cap.
 * Terminators or LIMIT-like text inside string literals and comments are not
 * understood; the read-only transaction in the executor is the backstop.
 */

import { SQLValidationError } from '../types/errors.js';

const LIMIT_PATTERN = /\blimit\s+(\d+)\b/i;

function assertPositiveInteger(maxRows: number): void {
  if (!Number.isInteger(maxRows) || maxRows <= 0) {
    throw new RangeError('max_rows must be a positive integer.');
  }
}

/**
 * Trim, drop one trailing terminator and apply the statement allow-list.
 */
function ensureSelectStatement(sql: string): string {
  if (!sql || !sql.trim()) {
    throw new SQLValidationError('SQL text cannot be empty.');
  }

  let cleaned = sql.trim();
  if (cleaned.endsWith(';')) {
    cleaned = cleaned.slice(0, -1).trimEnd();
  }

  if (!cleaned.toLowerCase().startsWith('select')) {
    throw new SQLValidationError('Only SELECT statements are permitted.');
  }

  if (cleaned.includes(';')) {
    throw new SQLValidationError('Multiple SQL statements are not allowed.');
  }

  return cleaned;
}

/**
 * Keep an in-range LIMIT, reject an over-cap one, append the cap otherwise.
 */
function enforceLimit(sql: string, maxRows: number): string {
  const match = LIMIT_PATTERN.exec(sql);
  if (match) {
    const requested = Number(match[1]);
    if (requested > maxRows) {
      throw new SQLValidationError(
        `Queries are limited to ${maxRows} rows; requested ${requested}.`
      );
    }
    return sql;
  }

  return `${sql} LIMIT ${maxRows}`;
}

/**
 * Validate raw SQL and rewrite it to be verifiably bounded.
 *
 * Idempotent: sanitizing already-sanitized text with the same cap returns it
 * unchanged.
 *
 * @throws SQLValidationError when the statement is rejected
 * @throws RangeError when maxRows is not a positive integer
 */
export function sanitizeSql(sql: string, maxRows: number): string {
  assertPositiveInteger(maxRows);
  return enforceLimit(ensureSelectStatement(sql), maxRows);
}
