/**
 * Quarantine record: identifiers whose classification failed, with the reason.
 *
 *   { "invalid_or_failed": [ { id, reason, timestamp }, ... ] }
 *
 * One entry per id. Entries older than the retention window are dropped on
 * load, so a still-failing id is logged again after it expires.
 */

import { DAY_MS } from '../config';
import { logger } from '../logger';
import { QuarantineDocument, QuarantineEntry } from '../types';
import { isRecord, readJsonFile, writeJsonFile } from './jsonFile';

export interface QuarantineStoreOptions {
  filePath: string;
  retentionDays: number;
}

function toEntry(value: unknown): QuarantineEntry | null {
  if (!isRecord(value)) return null;
  const id = Number(value.id);
  if (!Number.isInteger(id) || typeof value.timestamp !== 'string') return null;
  if (Number.isNaN(Date.parse(value.timestamp))) return null;
  return {
    id,
    reason: typeof value.reason === 'string' ? value.reason : 'unknown',
    timestamp: value.timestamp,
  };
}

export class QuarantineStore {
  readonly filePath: string;
  private retentionMs: number;
  private entries: QuarantineEntry[] = [];
  private ids = new Set<number>();
  private dirty = false;

  constructor(options: QuarantineStoreOptions) {
    this.filePath = options.filePath;
    this.retentionMs = options.retentionDays * DAY_MS;
  }

  load(now: Date = new Date()): QuarantineEntry[] {
    const raw = readJsonFile(this.filePath);
    const list: unknown[] = isRecord(raw) && Array.isArray(raw.invalid_or_failed) ? raw.invalid_or_failed : [];
    const cutoff = now.getTime() - this.retentionMs;

    this.entries = [];
    this.ids.clear();
    let expired = 0;

    for (const item of list) {
      const entry = toEntry(item);
      if (!entry) continue;
      if (Date.parse(entry.timestamp) < cutoff) {
        expired++;
        continue;
      }
      if (this.ids.has(entry.id)) continue;
      this.ids.add(entry.id);
      this.entries.push(entry);
    }

    this.dirty = expired > 0 || this.entries.length !== list.length;
    if (expired > 0) {
      logger.info('Expired quarantine entries', { expired, retained: this.entries.length });
    }
    return [...this.entries];
  }

  /**
   * Record a failure for `id` unless it is already quarantined. Returns true
   * when a new entry was added.
   */
  record(id: number, reason: string, now: Date = new Date()): boolean {
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    this.entries.push({ id, reason, timestamp: now.toISOString() });
    this.dirty = true;
    return true;
  }

  has(id: number): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.entries.length;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  save(): void {
    const doc: QuarantineDocument = { invalid_or_failed: this.entries };
    writeJsonFile(this.filePath, doc);
    this.dirty = false;
  }
}
