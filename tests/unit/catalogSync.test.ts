import { describe, it, expect } from 'vitest';
import { syncCatalog } from '../../src/catalogSync';
import { MemoryLedger } from '../helpers/memoryLedger';

describe('syncCatalog', () => {
  it('adds only identifiers the ledger does not know', async () => {
    const ledger = new MemoryLedger();
    ledger.put({ appid: 20, fetched: true, classified: true });
    let clock = 1000;

    const result = await syncCatalog({ getAppList: async () => [10, 20, 30] }, ledger, () => (clock += 250));

    expect(result).toEqual({ listed: 3, added: 2, durationMs: 250 });
    expect(await ledger.get(20)).toMatchObject({ fetched: true, classified: true });
    expect(await ledger.get(30)).toMatchObject({ fetched: false, classified: false, retryCount: 0 });
  });
});
