import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { QUARANTINE_FILE, createResultSink } from '../../src/resultSink';
import { ClassificationResult } from '../../src/types';
import { makeTempDir, readJson, removeTempDir } from '../helpers/tempDir';

const NOW = new Date('2024-06-01T00:00:00.000Z');

function result(appid: number, supportsLanguage: boolean, hasFeatureTag: boolean): ClassificationResult {
  return { appid, name: `App ${appid}`, type: 'game', supportsLanguage, hasFeatureTag, lastChecked: NOW.toISOString() };
}

describe('ResultSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function sink() {
    return createResultSink({
      dataDirectory: dir,
      language: 'schinese',
      featureTag: 'trading-cards',
      quarantineRetentionDays: 30,
    });
  }

  it('creates every store on load', () => {
    sink().load(NOW);

    expect(fs.existsSync(path.join(dir, 'schinese-games.json'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'trading-cards-games.json'))).toBe(true);
  });

  it('creates no files when loaded read-only', () => {
    const s = sink();
    s.load(NOW, { readOnly: true });

    expect(fs.readdirSync(dir)).toEqual([]);
    expect(s.totals()).toEqual({ 'language:schinese': 0, 'feature:trading-cards': 0 });
  });

  it('routes each result to the stores whose predicate matches', () => {
    const s = sink();
    s.load(NOW);

    const outcomes = s.merge([result(1, true, false), result(2, true, true), result(3, false, false)], NOW);

    expect(outcomes).toEqual([
      { store: 'language:schinese', status: 'saved', upserted: 2, matched: 2 },
      { store: 'feature:trading-cards', status: 'saved', upserted: 1, matched: 1 },
    ]);
    expect(s.totals()).toEqual({ 'language:schinese': 2, 'feature:trading-cards': 1 });
    expect(readJson(path.join(dir, 'trading-cards-games.json'))).toEqual({
      _metadata: { created: NOW.toISOString(), updated: NOW.toISOString(), version: 1 },
      entries: { '2': result(2, true, true) },
    });
  });

  it('skips stores with nothing to merge', () => {
    const s = sink();
    s.load(NOW);

    expect(s.merge([result(4, false, false)], NOW)).toEqual([
      { store: 'language:schinese', status: 'skipped', upserted: 0, matched: 0 },
      { store: 'feature:trading-cards', status: 'skipped', upserted: 0, matched: 0 },
    ]);
  });

  it('reports a store that fails to save and still saves the others', () => {
    const s = sink();
    s.load(NOW);
    const languagePath = path.join(dir, 'schinese-games.json');
    fs.rmSync(languagePath);
    fs.mkdirSync(languagePath);

    const outcomes = s.merge([result(1, true, true)], NOW);

    expect(outcomes[0]).toMatchObject({ store: 'language:schinese', status: 'failed', matched: 1 });
    expect(outcomes[0].error).toContain('Error writing');
    expect(outcomes[1]).toEqual({ store: 'feature:trading-cards', status: 'saved', upserted: 1, matched: 1 });
  });

  it('writes the quarantine record only when it changed', () => {
    const s = sink();
    s.load(NOW);

    expect(s.flushQuarantine().status).toBe('skipped');
    expect(s.recordFailure(9, 'parse-error', NOW)).toBe(true);
    expect(s.recordFailure(9, 'parse-error', NOW)).toBe(false);
    expect(s.flushQuarantine()).toEqual({ store: 'quarantine', status: 'saved', upserted: 0, matched: 1 });

    expect(readJson(path.join(dir, QUARANTINE_FILE))).toEqual({
      invalid_or_failed: [{ id: 9, reason: 'parse-error', timestamp: NOW.toISOString() }],
    });
  });
});
