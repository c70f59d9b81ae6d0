import { describe, it, expect, beforeEach } from 'vitest';
import { BatchSelector } from '../../src/batchSelector';
import { DAY_MS } from '../../src/config';
import { MemoryLedger } from '../helpers/memoryLedger';

const NOW = new Date('2024-06-01T00:00:00.000Z');
const daysAgo = (days: number) => new Date(NOW.getTime() - days * DAY_MS);

describe('BatchSelector', () => {
  let ledger: MemoryLedger;
  let selector: BatchSelector;

  beforeEach(() => {
    ledger = new MemoryLedger();
    selector = new BatchSelector(ledger, {
      batchSize: 3,
      probeBatchSize: 2,
      retryCeiling: 3,
      stalenessWindowDays: 30,
    });
  });

  it('selects fetched, unclassified identifiers in ascending order, bounded by batch size', async () => {
    for (const appid of [50, 10, 40, 20, 30]) {
      ledger.put({ appid, fetched: true });
    }
    ledger.put({ appid: 5 });

    await expect(selector.selectBatch(NOW)).resolves.toEqual([10, 20, 30]);
  });

  it('re-selects classifications older than the staleness window', async () => {
    ledger.put({ appid: 1, fetched: true, classified: true, classifiedAt: daysAgo(1) });
    ledger.put({ appid: 2, fetched: true, classified: true, classifiedAt: daysAgo(31) });
    ledger.put({ appid: 3, fetched: true, classified: true, classifiedAt: null });

    await expect(selector.selectBatch(NOW)).resolves.toEqual([2, 3]);
  });

  it('never re-selects identifiers closed by the retry ceiling', async () => {
    ledger.put({ appid: 7, fetched: true, classified: true, retryCount: 3, classifiedAt: daysAgo(90) });
    ledger.put({ appid: 8, fetched: true, retryCount: 2 });

    await expect(selector.selectBatch(NOW)).resolves.toEqual([8]);
  });

  it('selects unfetched identifiers below the ceiling for probing', async () => {
    ledger.put({ appid: 1, fetched: true });
    ledger.put({ appid: 2 });
    ledger.put({ appid: 3, retryCount: 3 });
    ledger.put({ appid: 4 });
    ledger.put({ appid: 5 });

    await expect(selector.selectProbeBatch()).resolves.toEqual([2, 4]);
  });

  it('returns nothing for a non-positive batch size', async () => {
    ledger.put({ appid: 1, fetched: true });
    const empty = new BatchSelector(ledger, { batchSize: 0, probeBatchSize: 0, retryCeiling: 3, stalenessWindowDays: 30 });

    await expect(empty.selectBatch(NOW)).resolves.toEqual([]);
    await expect(empty.selectProbeBatch()).resolves.toEqual([]);
  });

  it('dedupes and sorts whatever the ledger returns', async () => {
    ledger.selectStale = async () => [9, 3, 3, 1];

    await expect(selector.selectBatch(NOW)).resolves.toEqual([1, 3, 9]);
  });
});
