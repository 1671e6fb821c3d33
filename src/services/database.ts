/**
 * Database service using Knex.js.
 * Supports PostgreSQL (production) and SQLite via better-sqlite3 (local use,
 * tests). Both can confine a transaction to reads, which the executor relies on.
 */

import { knex, type Knex } from 'knex';
import type { DatabaseType } from '../config.js';
import { logger } from '../utils/logger.js';

/**
 * Statements that switch a transaction into read-only mode and back.
 */
export interface ReadOnlyScope {
  enter: readonly string[];
  exit: readonly string[];
}

/**
 * PostgreSQL scopes the setting to the transaction itself; SQLite has no
 * read-only transactions, so the connection is flipped to query_only for the
 * duration of the transaction and flipped back afterwards.
 */
const READ_ONLY_SCOPES: Record<DatabaseType, ReadOnlyScope> = {
  pg: {
    enter: ['SET TRANSACTION READ ONLY'],
    exit: [],
  },
  sqlite3: {
    enter: ['PRAGMA query_only = ON'],
    exit: ['PRAGMA query_only = OFF'],
  },
};

/**
 * Map a Knex client name to the dialect it speaks.
 */
export function databaseTypeOf(db: Knex): DatabaseType {
  const client: unknown = db.client.config.client;
  const name = typeof client === 'string' ? client : '';
  if (name === 'pg' || name === 'postgres' || name === 'postgresql') {
    return 'pg';
  }
  if (name === 'better-sqlite3' || name === 'sqlite3') {
    return 'sqlite3';
  }
  throw new Error(`Unsupported database client: ${name || 'unknown'}`);
}

export function readOnlyScopeFor(type: DatabaseType): ReadOnlyScope {
  return READ_ONLY_SCOPES[type];
}

/**
 * Global Knex instance.
 */
let db: Knex | null = null;

/**
 * Get the current Knex instance.
 */
export function getDb(): Knex {
  if (!db) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return db;
}

/**
 * Initialize the process-wide database connection and check it answers.
 */
export async function initDb(config: Knex.Config): Promise<Knex> {
  if (db) {
    return db;
  }

  const instance = knex(config);
  try {
    await instance.raw('SELECT 1');
  } catch (error) {
    logger.error({ err: error }, 'Failed to connect to database');
    await instance.destroy();
    throw error;
  }

  db = instance;
  logger.info(`Database initialized: ${String(config.client)}`);
  return db;
}

/**
 * Cheap liveness probe used by the health endpoint.
 */
export async function pingDb(instance: Knex): Promise<boolean> {
  try {
    await instance.raw('SELECT 1');
    return true;
  } catch (error) {
    logger.warn({ err: error }, 'Database ping failed');
    return false;
  }
}

/**
 * Close database connection.
 */
export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    logger.info('Database connection closed');
  }
}
