/**
 * Ledger repository: the durable per-identifier record of what has been
 * attempted. One row per AppID in the `apps` table.
 */

import { Pool } from 'pg';
import { execute, queryOne, queryRows } from './index';
import { PersistenceError } from '../errors';
import { logger } from '../logger';
import { FailureUpdate, IdentifierRecord, LedgerStats } from '../types';

export interface LedgerRepository {
  initialize(): Promise<void>;
  count(): Promise<number>;
  /** Insert identifiers not yet present; returns how many were new. */
  seed(appids: number[]): Promise<number>;
  selectUnfetched(limit: number, retryCeiling: number): Promise<number[]>;
  selectStale(limit: number, staleBefore: Date, retryCeiling: number): Promise<number[]>;
  markClassified(appid: number, isGame: boolean, at: Date): Promise<void>;
  recordFailure(appid: number, retryCeiling: number, at: Date): Promise<FailureUpdate>;
  get(appid: number): Promise<IdentifierRecord | null>;
  stats(retryCeiling: number): Promise<LedgerStats>;
}

type LedgerRow = {
  appid: number;
  fetched: boolean;
  classified: boolean;
  is_game: boolean;
  retry_count: number;
  classified_at: Date | null;
  last_updated: Date;
};

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS apps (
    appid INTEGER PRIMARY KEY,
    fetched BOOLEAN NOT NULL DEFAULT FALSE,
    classified BOOLEAN NOT NULL DEFAULT FALSE,
    is_game BOOLEAN NOT NULL DEFAULT FALSE,
    retry_count INTEGER NOT NULL DEFAULT 0,
    classified_at TIMESTAMPTZ,
    last_updated TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

/**
 * Additive migrations for ledgers created by an older layout. Each one is
 * idempotent and default-fills existing rows.
 */
export const LEDGER_MIGRATIONS: string[] = [
  `ALTER TABLE apps ADD COLUMN IF NOT EXISTS fetched BOOLEAN NOT NULL DEFAULT FALSE`,
  `ALTER TABLE apps ADD COLUMN IF NOT EXISTS classified BOOLEAN NOT NULL DEFAULT FALSE`,
  `ALTER TABLE apps ADD COLUMN IF NOT EXISTS is_game BOOLEAN NOT NULL DEFAULT FALSE`,
  `ALTER TABLE apps ADD COLUMN IF NOT EXISTS retry_count INTEGER NOT NULL DEFAULT 0`,
  `ALTER TABLE apps ADD COLUMN IF NOT EXISTS classified_at TIMESTAMPTZ`,
  `ALTER TABLE apps ADD COLUMN IF NOT EXISTS last_updated TIMESTAMPTZ NOT NULL DEFAULT NOW()`,
];

/**
 * Older ledgers tracked progress as `status` (detail fetched) and
 * `scraper_status` (classified). Their flags carry over once.
 */
const LEGACY_FLAG_COLUMNS: Array<{ legacy: string; column: 'fetched' | 'classified' }> = [
  { legacy: 'status', column: 'fetched' },
  { legacy: 'scraper_status', column: 'classified' },
];

const SEED_CHUNK_SIZE = 1000;

function rowToRecord(row: LedgerRow): IdentifierRecord {
  return {
    appid: Number(row.appid),
    fetched: row.fetched,
    classified: row.classified,
    isGame: row.is_game,
    retryCount: Number(row.retry_count),
    classifiedAt: row.classified_at ? new Date(row.classified_at) : null,
    lastUpdated: new Date(row.last_updated),
  };
}

export class PgLedgerRepository implements LedgerRepository {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async initialize(): Promise<void> {
    await execute(this.pool, 'initialize', CREATE_TABLE);
    for (const migration of LEDGER_MIGRATIONS) {
      await execute(this.pool, 'migrate', migration);
    }
    await this.migrateLegacyFlags();
    await execute(
      this.pool,
      'initialize',
      `CREATE INDEX IF NOT EXISTS idx_apps_progress ON apps (fetched, classified, appid)`
    );
    logger.debug('Ledger schema ready');
  }

  private async migrateLegacyFlags(): Promise<void> {
    const columns = await queryRows<{ column_name: string }>(
      this.pool,
      'migrate',
      `SELECT column_name FROM information_schema.columns WHERE table_name = 'apps'`
    );
    const present = new Set(columns.map((c) => c.column_name));

    for (const { legacy, column } of LEGACY_FLAG_COLUMNS) {
      if (!present.has(legacy)) continue;
      const updated = await execute(
        this.pool,
        'migrate',
        `UPDATE apps SET ${column} = TRUE, last_updated = NOW() WHERE ${legacy} = TRUE AND ${column} = FALSE`
      );
      if (updated > 0) {
        logger.info('Carried over legacy ledger flags', { from: legacy, to: column, rows: updated });
      }
    }
  }

  async count(): Promise<number> {
    const row = await queryOne<{ count: string }>(this.pool, 'count', `SELECT COUNT(*) AS count FROM apps`);
    return row ? parseInt(String(row.count), 10) : 0;
  }

  async seed(appids: number[]): Promise<number> {
    let added = 0;
    for (let i = 0; i < appids.length; i += SEED_CHUNK_SIZE) {
      const chunk = appids.slice(i, i + SEED_CHUNK_SIZE);
      added += await execute(
        this.pool,
        'seed',
        `INSERT INTO apps (appid)
         SELECT UNNEST($1::int[])
         ON CONFLICT (appid) DO NOTHING`,
        [chunk]
      );
    }
    return added;
  }

  async selectUnfetched(limit: number, retryCeiling: number): Promise<number[]> {
    const rows = await queryRows<{ appid: number }>(
      this.pool,
      'selectUnfetched',
      `SELECT appid FROM apps
       WHERE fetched = FALSE AND retry_count < $2
       ORDER BY appid ASC
       LIMIT $1`,
      [limit, retryCeiling]
    );
    return rows.map((r) => Number(r.appid));
  }

  async selectStale(limit: number, staleBefore: Date, retryCeiling: number): Promise<number[]> {
    const rows = await queryRows<{ appid: number }>(
      this.pool,
      'selectStale',
      `SELECT appid FROM apps
       WHERE fetched = TRUE
         AND (
           classified = FALSE
           OR (retry_count < $3 AND (classified_at IS NULL OR classified_at < $2))
         )
       ORDER BY appid ASC
       LIMIT $1`,
      [limit, staleBefore, retryCeiling]
    );
    return rows.map((r) => Number(r.appid));
  }

  async markClassified(appid: number, isGame: boolean, at: Date): Promise<void> {
    await this.updateOne(
      'markClassified',
      appid,
      `UPDATE apps
       SET fetched = TRUE, classified = TRUE, is_game = $2, retry_count = 0,
           classified_at = $3, last_updated = $3
       WHERE appid = $1`,
      [appid, isGame, at]
    );
  }

  /**
   * Count one more consecutive failure. Reaching the ceiling forces
   * `classified = true` in the same statement.
   */
  async recordFailure(appid: number, retryCeiling: number, at: Date): Promise<FailureUpdate> {
    const row = await queryOne<{ appid: number; retry_count: number; classified: boolean }>(
      this.pool,
      'recordFailure',
      `UPDATE apps
       SET retry_count = retry_count + 1,
           classified = classified OR (retry_count + 1 >= $2),
           classified_at = CASE
             WHEN classified = FALSE AND retry_count + 1 >= $2 THEN $3
             ELSE classified_at
           END,
           last_updated = $3
       WHERE appid = $1
       RETURNING appid, retry_count, classified`,
      [appid, retryCeiling, at]
    );

    if (!row) {
      throw new PersistenceError(`Ledger has no row for appid ${appid}`, 'recordFailure', { appid });
    }

    const retryCount = Number(row.retry_count);
    return {
      appid,
      retryCount,
      classified: row.classified,
      exhausted: retryCount >= retryCeiling,
    };
  }

  async get(appid: number): Promise<IdentifierRecord | null> {
    const row = await queryOne<LedgerRow>(
      this.pool,
      'get',
      `SELECT appid, fetched, classified, is_game, retry_count, classified_at, last_updated
       FROM apps WHERE appid = $1`,
      [appid]
    );
    return row ? rowToRecord(row) : null;
  }

  async stats(retryCeiling: number): Promise<LedgerStats> {
    const row = await queryOne<{
      total: string;
      fetched: string;
      classified: string;
      games: string;
      exhausted: string;
    }>(
      this.pool,
      'stats',
      `SELECT
         COUNT(*) AS total,
         COUNT(*) FILTER (WHERE fetched) AS fetched,
         COUNT(*) FILTER (WHERE classified) AS classified,
         COUNT(*) FILTER (WHERE is_game) AS games,
         COUNT(*) FILTER (WHERE retry_count >= $1) AS exhausted
       FROM apps`,
      [retryCeiling]
    );

    return {
      total: parseInt(String(row?.total ?? 0), 10),
      fetched: parseInt(String(row?.fetched ?? 0), 10),
      classified: parseInt(String(row?.classified ?? 0), 10),
      games: parseInt(String(row?.games ?? 0), 10),
      exhausted: parseInt(String(row?.exhausted ?? 0), 10),
    };
  }

  private async updateOne(operation: string, appid: number, text: string, params: unknown[]): Promise<void> {
    const updated = await execute(this.pool, operation, text, params);
    if (updated === 0) {
      throw new PersistenceError(`Ledger has no row for appid ${appid}`, operation, { appid });
    }
  }
}
