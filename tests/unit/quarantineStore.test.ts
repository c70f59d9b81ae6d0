import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { QuarantineStore } from '../../src/storage/quarantineStore';
import { makeTempDir, readJson, removeTempDir } from '../helpers/tempDir';

const NOW = new Date('2024-06-01T00:00:00.000Z');

describe('QuarantineStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = makeTempDir();
    filePath = path.join(dir, 'invalid_appids.json');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('starts empty and clean when the file is absent', () => {
    const store = new QuarantineStore({ filePath, retentionDays: 30 });
    expect(store.load(NOW)).toEqual([]);
    expect(store.isDirty).toBe(false);
  });

  it('drops expired and duplicate entries on load', () => {
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        invalid_or_failed: [
          { id: 1, reason: 'parse-error', timestamp: '2024-04-01T00:00:00.000Z' },
          { id: 2, reason: 'api-reported-failure', timestamp: '2024-05-20T00:00:00.000Z' },
          { id: 2, reason: 'parse-error', timestamp: '2024-05-25T00:00:00.000Z' },
          { id: 3, reason: 'parse-error', timestamp: '2024-05-30T00:00:00.000Z' },
        ],
      })
    );
    const store = new QuarantineStore({ filePath, retentionDays: 30 });

    expect(store.load(NOW)).toEqual([
      { id: 2, reason: 'api-reported-failure', timestamp: '2024-05-20T00:00:00.000Z' },
      { id: 3, reason: 'parse-error', timestamp: '2024-05-30T00:00:00.000Z' },
    ]);
    expect(store.isDirty).toBe(true);
    expect(store.has(1)).toBe(false);
  });

  it('records each id once and persists the record', () => {
    const store = new QuarantineStore({ filePath, retentionDays: 30 });
    store.load(NOW);

    expect(store.record(5, 'api-reported-failure', NOW)).toBe(true);
    expect(store.record(5, 'parse-error', NOW)).toBe(false);
    store.save();

    expect(readJson(filePath)).toEqual({
      invalid_or_failed: [{ id: 5, reason: 'api-reported-failure', timestamp: NOW.toISOString() }],
    });
    expect(store.isDirty).toBe(false);
  });
});
