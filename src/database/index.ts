/**
 * Database connection pool and utilities for PostgreSQL.
 */

import { Pool, QueryResultRow } from 'pg';
import { PersistenceError, errorMessage } from '../errors';
import { logger } from '../logger';

export interface DatabaseConfig {
  databaseUrl: string;
  databaseSsl: boolean;
}

/**
 * Create the ledger pool. A single crawler holds one connection for the
 * whole run; every statement on it is committed on its own.
 */
export function createPool(config: DatabaseConfig): Pool {
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: 1,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    ssl: config.databaseSsl ? { rejectUnauthorized: false } : undefined,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database pool error', { error: err.message });
  });

  logger.debug('Database pool initialized');
  return pool;
}

/**
 * Execute a query and return rows. Driver failures become PersistenceError.
 */
export async function queryRows<T extends QueryResultRow>(
  pool: Pool,
  operation: string,
  text: string,
  params: unknown[] = []
): Promise<T[]> {
  try {
    const result = await pool.query<T>(text, params);
    return result.rows;
  } catch (error) {
    throw new PersistenceError(`Ledger ${operation} failed: ${errorMessage(error)}`, operation);
  }
}

/**
 * Execute a query and return first row or null.
 */
export async function queryOne<T extends QueryResultRow>(
  pool: Pool,
  operation: string,
  text: string,
  params: unknown[] = []
): Promise<T | null> {
  const rows = await queryRows<T>(pool, operation, text, params);
  return rows[0] ?? null;
}

/**
 * Execute a statement and return the affected row count.
 */
export async function execute(
  pool: Pool,
  operation: string,
  text: string,
  params: unknown[] = []
): Promise<number> {
  try {
    const result = await pool.query(text, params);
    return result.rowCount ?? 0;
  } catch (error) {
    throw new PersistenceError(`Ledger ${operation} failed: ${errorMessage(error)}`, operation);
  }
}

/**
 * Close the database pool.
 */
export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
  logger.debug('Database pool closed');
}

export { Pool };
