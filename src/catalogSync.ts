/**
 * Pulls the full identifier universe from the bulk listing into the ledger.
 */

import { AppListSource } from './apiClient';
import { LedgerRepository } from './database/ledgerRepository';
import { logger } from './logger';

export interface CatalogSyncResult {
  listed: number;
  added: number;
  durationMs: number;
}

/**
 * Insert every listed identifier the ledger does not know yet. Existing rows
 * are left untouched.
 */
export async function syncCatalog(
  source: AppListSource,
  ledger: LedgerRepository,
  now: () => number = Date.now
): Promise<CatalogSyncResult> {
  const start = now();
  logger.info('Fetching app list');

  const appids = await source.getAppList();
  const added = await ledger.seed(appids);
  const durationMs = now() - start;

  logger.info('App list synced', { listed: appids.length, added, durationMs });
  return { listed: appids.length, added, durationMs };
}
