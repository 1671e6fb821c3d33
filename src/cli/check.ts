/**
 * Run the safety validator offline, without a model or a database.
 */

import { sanitizeSql } from '../services/sql-safety.js';
import { SQLValidationError } from '../types/errors.js';
import * as logger from './logger.js';

export type CheckResult = { ok: true; sql: string } | { ok: false; message: string };

export function checkSql(sql: string, maxRows: number): CheckResult {
  try {
    return { ok: true, sql: sanitizeSql(sql, maxRows) };
  } catch (error) {
    if (error instanceof SQLValidationError || error instanceof RangeError) {
      return { ok: false, message: error.message };
    }
    throw error;
  }
}

/**
 * @returns process exit code
 */
export function runCheck(sql: string, maxRows: number): number {
  const result = checkSql(sql, maxRows);
  if (!result.ok) {
    logger.error('Rejected', result.message);
    return 1;
  }
  logger.success('Accepted');
  logger.code(result.sql, 'sql');
  return 0;
}
