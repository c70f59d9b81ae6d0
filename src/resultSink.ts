/**
 * Result sink: merges classification results into the category stores and
 * keeps the quarantine record.
 *
 * The worker only proposes results; this is the one place they are persisted.
 */

import * as path from 'path';
import { errorMessage } from './errors';
import { logger } from './logger';
import { CategoryStore, LoadOptions } from './storage/categoryStore';
import { QuarantineStore } from './storage/quarantineStore';
import { ClassificationResult } from './types';

export type FlushStatus = 'saved' | 'skipped' | 'failed';

export interface StoreFlushResult {
  store: string;
  status: FlushStatus;
  upserted: number;   // Results whose stored content changed
  matched: number;    // Results that belonged in the store
  error?: string;
}

export interface ResultSinkOptions {
  dataDirectory: string;
  language: string;
  featureTag: string;
  quarantineRetentionDays: number;
}

export const QUARANTINE_FILE = 'invalid_appids.json';

export class ResultSink {
  readonly stores: CategoryStore[];
  readonly quarantine: QuarantineStore;

  constructor(stores: CategoryStore[], quarantine: QuarantineStore) {
    this.stores = stores;
    this.quarantine = quarantine;
  }

  /**
   * Load every store (creating absent ones unless `readOnly`) and the
   * quarantine record.
   */
  load(now: Date = new Date(), options: LoadOptions = {}): void {
    for (const store of this.stores) {
      store.load(now, options);
    }
    this.quarantine.load(now);
  }

  /**
   * Upsert each result into every store whose predicate matches, refresh
   * `updated` on each touched store and rewrite it. A store that fails to
   * save is reported and does not stop the others.
   */
  merge(results: ClassificationResult[], now: Date = new Date()): StoreFlushResult[] {
    const outcomes: StoreFlushResult[] = [];

    for (const store of this.stores) {
      const matching = results.filter((result) => store.matches(result));
      if (matching.length === 0) {
        outcomes.push({ store: store.name, status: 'skipped', upserted: 0, matched: 0 });
        continue;
      }

      try {
        let upserted = 0;
        for (const result of matching) {
          if (store.upsert(result)) upserted++;
        }
        store.touch(now);
        store.save();
        outcomes.push({ store: store.name, status: 'saved', upserted, matched: matching.length });
        logger.info('Category store saved', {
          store: store.name,
          matched: matching.length,
          upserted,
          total: store.size,
        });
      } catch (error) {
        const message = errorMessage(error);
        outcomes.push({
          store: store.name,
          status: 'failed',
          upserted: 0,
          matched: matching.length,
          error: message,
        });
        logger.error('Category store flush failed', { store: store.name, error: message });
      }
    }

    return outcomes;
  }

  /**
   * Record a discarded identifier. Repeats of an already-quarantined id are
   * not logged again.
   */
  recordFailure(appid: number, reason: string, now: Date = new Date()): boolean {
    const added = this.quarantine.record(appid, reason, now);
    if (added) {
      logger.warn('Quarantined appid', { appid, reason });
    }
    return added;
  }

  flushQuarantine(): StoreFlushResult {
    if (!this.quarantine.isDirty) {
      return { store: 'quarantine', status: 'skipped', upserted: 0, matched: 0 };
    }
    try {
      this.quarantine.save();
      return { store: 'quarantine', status: 'saved', upserted: 0, matched: this.quarantine.size };
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Quarantine flush failed', { error: message });
      return { store: 'quarantine', status: 'failed', upserted: 0, matched: 0, error: message };
    }
  }

  totals(): Record<string, number> {
    const totals: Record<string, number> = {};
    for (const store of this.stores) {
      totals[store.name] = store.size;
    }
    return totals;
  }
}

/**
 * Stores for the configured dimensions: one for language support, one for
 * the feature tag.
 */
export function createResultSink(options: ResultSinkOptions): ResultSink {
  const languageStore = new CategoryStore({
    name: `language:${options.language}`,
    filePath: path.join(options.dataDirectory, `${options.language}-games.json`),
    matches: (result) => result.supportsLanguage,
  });

  const featureStore = new CategoryStore({
    name: `feature:${options.featureTag}`,
    filePath: path.join(options.dataDirectory, `${options.featureTag}-games.json`),
    matches: (result) => result.hasFeatureTag,
  });

  const quarantine = new QuarantineStore({
    filePath: path.join(options.dataDirectory, QUARANTINE_FILE),
    retentionDays: options.quarantineRetentionDays,
  });

  return new ResultSink([languageStore, featureStore], quarantine);
}
