/**
 * Picks the next bounded set of identifiers from the ledger.
 */

import { DAY_MS } from './config';
import { LedgerRepository } from './database/ledgerRepository';

export interface BatchSelectorOptions {
  batchSize: number;
  probeBatchSize: number;
  retryCeiling: number;
  stalenessWindowDays: number;
}

function bounded(ids: number[], limit: number): number[] {
  return [...new Set(ids)].sort((a, b) => a - b).slice(0, Math.max(0, limit));
}

export class BatchSelector {
  private ledger: LedgerRepository;
  private options: BatchSelectorOptions;

  constructor(ledger: LedgerRepository, options: BatchSelectorOptions) {
    this.ledger = ledger;
    this.options = options;
  }

  /**
   * Fetched identifiers whose classification is missing or older than the
   * staleness window, ascending, at most batchSize. Identifiers closed by
   * retry exhaustion are not re-checked.
   */
  async selectBatch(now: Date): Promise<number[]> {
    const { batchSize, retryCeiling, stalenessWindowDays } = this.options;
    if (batchSize <= 0) return [];

    const staleBefore = new Date(now.getTime() - stalenessWindowDays * DAY_MS);
    const ids = await this.ledger.selectStale(batchSize, staleBefore, retryCeiling);
    return bounded(ids, batchSize);
  }

  /**
   * Identifiers whose details have never been retrieved, ascending, at most
   * probeBatchSize.
   */
  async selectProbeBatch(): Promise<number[]> {
    const { probeBatchSize, retryCeiling } = this.options;
    if (probeBatchSize <= 0) return [];

    const ids = await this.ledger.selectUnfetched(probeBatchSize, retryCeiling);
    return bounded(ids, probeBatchSize);
  }
}
