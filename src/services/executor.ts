/**
 * Bounded, read-only query execution.
 *
 * Every statement runs inside a transaction the data store itself has been
 * told is read-only, so a mutating statement that slipped past the lexical
 * validator is still refused.
 */

import type Database from 'better-sqlite3';
import type { Knex } from 'knex';
import { z } from 'zod';
import type { DatabaseType } from '../config.js';
import { SQLExecutionError, errorMessage } from '../types/errors.js';
import type { JsonObject } from '../types/utils.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { columnKindForPgType, encodeRow, type ColumnKind } from './codec.js';
import { databaseTypeOf, readOnlyScopeFor, type ReadOnlyScope } from './database.js';
import { sanitizeSql } from './sql-safety.js';

/**
 * Rows and timing from one executed statement.
 */
export interface ExecutionResult {
  /** Statement as actually executed */
  sql: string;
  columns: string[];
  rows: JsonObject[];
  /** Wall-clock duration of execute + fetch, excluding transaction setup */
  executionMs: number;
  /** The store returned more rows than the cap; the extra rows were dropped */
  truncated?: boolean;
}

export interface QueryExecutorOptions {
  /**
   * Per-statement deadline.
   * @default 30000
   */
  statementTimeoutMs?: number;
  logger?: Logger;
}

const RowsSchema = z.array(z.record(z.unknown()));

/**
 * node-postgres Result: rows plus ordered field descriptions.
 */
const PgResultSchema = z.object({
  rows: RowsSchema,
  fields: z.array(z.object({ name: z.string(), dataTypeID: z.number() })),
});

export interface DriverResult {
  columns: string[];
  kinds: Map<string, ColumnKind>;
  rows: Record<string, unknown>[];
}

function isSqliteConnection(connection: unknown): connection is Database.Database {
  return (
    typeof connection === 'object' &&
    connection !== null &&
    'prepare' in connection &&
    typeof connection.prepare === 'function'
  );
}

/**
 * Normalize dialect-specific raw() results.
 *
 * SQLite rows are plain objects, which cannot keep integer-like keys in select
 * order and say nothing about an empty result; pass the statement's declared
 * columns when they are known.
 */
export function readDriverResult(raw: unknown, declaredColumns?: readonly string[]): DriverResult {
  // PostgreSQL: { rows: [...], fields: [...] }
  const pg = PgResultSchema.safeParse(raw);
  if (pg.success) {
    const columns = [...new Set(pg.data.fields.map((field) => field.name))];
    const kinds = new Map<string, ColumnKind>();
    for (const field of pg.data.fields) {
      kinds.set(field.name, columnKindForPgType(field.dataTypeID));
    }
    return { columns, kinds, rows: pg.data.rows };
  }

  // SQLite: array of rows
  const rows = RowsSchema.safeParse(raw);
  if (rows.success) {
    const [first] = rows.data;
    const columns = declaredColumns ? [...new Set(declaredColumns)] : first ? Object.keys(first) : [];
    return {
      columns,
      kinds: new Map(),
      rows: rows.data,
    };
  }

  throw new SQLExecutionError('Unrecognized result from the data store.');
}

/**
 * Runs validated statements and serializes their results.
 */
export class QueryExecutor {
  private readonly dialect: DatabaseType;
  private readonly scope: ReadOnlyScope;
  private readonly statementTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly db: Knex,
    options: QueryExecutorOptions = {}
  ) {
    this.dialect = databaseTypeOf(db);
    this.scope = readOnlyScopeFor(this.dialect);
    this.statementTimeoutMs = options.statementTimeoutMs ?? 30_000;
    this.logger = (options.logger ?? rootLogger).child({ component: 'executor' });
  }

  /**
   * Execute one statement under a read-only transaction.
   *
   * The statement is re-sanitized first (a no-op for validator output).
   *
   * @throws SQLValidationError if the statement does not pass the validator
   * @throws SQLExecutionError on any data-store failure
   */
  async execute(sql: string, maxRows: number): Promise<ExecutionResult> {
    const sanitized = sanitizeSql(sql, maxRows);
    this.logger.debug({ sql: sanitized }, 'Executing statement');

    try {
      const result = await this.db.transaction(async (trx) => {
        for (const statement of this.scope.enter) {
          await trx.raw(statement);
        }

        try {
          const started = performance.now();
          const raw: unknown = await trx
            .raw(sanitized)
            .timeout(this.statementTimeoutMs, { cancel: this.dialect === 'pg' });
          const executionMs = performance.now() - started;
          const columns =
            this.dialect === 'sqlite3' ? await this.describeColumns(trx, sanitized) : undefined;
          return { raw, executionMs, columns };
        } finally {
          for (const statement of this.scope.exit) {
            await trx.raw(statement);
          }
        }
      });

      const { columns, kinds, rows } = readDriverResult(result.raw, result.columns);
      // LIMIT <offset>, <count> passes the lexical check with the offset read as the limit
      const truncated = rows.length > maxRows;
      if (truncated) {
        this.logger.warn({ rowCount: rows.length, maxRows }, 'Result exceeds the row cap; truncating');
      }
      const encoded = rows.slice(0, maxRows).map((row) => encodeRow(row, columns, kinds));

      this.logger.info(
        { rowCount: encoded.length, executionMs: result.executionMs },
        'Statement executed'
      );

      return {
        sql: sanitized,
        columns,
        rows: encoded,
        executionMs: result.executionMs,
        truncated,
      };
    } catch (error) {
      this.logger.warn({ err: error }, 'Statement failed');
      if (error instanceof SQLExecutionError) {
        throw error;
      }
      throw new SQLExecutionError(errorMessage(error), sanitized);
    }
  }

  /**
   * Result columns in select order, read from the prepared statement on the
   * transaction's own connection.
   */
  private async describeColumns(trx: Knex.Transaction, sql: string): Promise<string[]> {
    const connection: unknown = await trx.client.acquireConnection();
    if (!isSqliteConnection(connection)) {
      throw new SQLExecutionError('Unrecognized SQLite connection.', sql);
    }
    return connection
      .prepare(sql)
      .columns()
      .map((column) => column.name);
  }
}
