/**
 * Category store: one JSON document per classification dimension, mapping
 * AppID to its most recent ClassificationResult.
 *
 *   { "_metadata": { created, updated, version }, "entries": { "<appid>": {...} } }
 *
 * Entries are upserted, never deleted.
 */

import { PersistenceError } from '../errors';
import { logger } from '../logger';
import { CategoryStoreDocument, ClassificationResult, StoreMetadata } from '../types';
import { isRecord, readJsonFile, writeJsonFile } from './jsonFile';

export const STORE_SCHEMA_VERSION = 1;

export interface LoadOptions {
  /** Read only: an absent or legacy document is not written back. */
  readOnly?: boolean;
}

export interface CategoryStoreOptions {
  name: string;
  filePath: string;
  /** Whether a result belongs in this store. */
  matches: (result: ClassificationResult) => boolean;
}

export function emptyStoreDocument(now: Date): CategoryStoreDocument {
  const timestamp = now.toISOString();
  return {
    _metadata: { created: timestamp, updated: timestamp, version: STORE_SCHEMA_VERSION },
    entries: {},
  };
}

function asString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/**
 * Normalize one stored entry. Documents written by the older layout use
 * snake_case fields (`supports_chinese`, `supports_cards`, `last_checked`).
 */
export function normalizeEntry(key: string, value: unknown, fallbackTimestamp: string): ClassificationResult | null {
  if (!isRecord(value)) return null;

  const appid = Number(value.appid ?? key);
  if (!Number.isInteger(appid) || appid <= 0) return null;

  return {
    appid,
    name: asString(value.name, ''),
    type: asString(value.type, 'game'),
    supportsLanguage: Boolean(value.supportsLanguage ?? value.supports_chinese ?? false),
    hasFeatureTag: Boolean(value.hasFeatureTag ?? value.supports_cards ?? false),
    lastChecked: asString(value.lastChecked ?? value.last_checked, fallbackTimestamp),
  };
}

/**
 * Bring a parsed document to the current schema. Older documents keep their
 * entries under `games`; they are moved to `entries`.
 */
export function migrateStoreDocument(raw: unknown, now: Date, filePath: string): { doc: CategoryStoreDocument; migrated: boolean } {
  if (!isRecord(raw)) {
    throw new PersistenceError(`Category store ${filePath} is not a JSON object`, 'load', { filePath });
  }

  const nowIso = now.toISOString();
  const meta = isRecord(raw._metadata) ? raw._metadata : {};
  const version = typeof meta.version === 'number' ? meta.version : 0;

  if (version > STORE_SCHEMA_VERSION) {
    throw new PersistenceError(
      `Category store ${filePath} has schema version ${version}, newer than supported ${STORE_SCHEMA_VERSION}`,
      'load',
      { filePath, version }
    );
  }

  const legacyEntries = !isRecord(raw.entries) && isRecord(raw.games);
  const source = isRecord(raw.entries) ? raw.entries : isRecord(raw.games) ? raw.games : {};
  const created = asString(meta.created, nowIso);

  const entries: Record<string, ClassificationResult> = {};
  for (const [key, value] of Object.entries(source)) {
    const entry = normalizeEntry(key, value, created);
    if (entry) entries[String(entry.appid)] = entry;
  }

  const metadata: StoreMetadata = {
    created,
    updated: asString(meta.updated, created),
    version: STORE_SCHEMA_VERSION,
  };

  return {
    doc: { _metadata: metadata, entries },
    migrated: legacyEntries || version !== STORE_SCHEMA_VERSION,
  };
}

export class CategoryStore {
  readonly name: string;
  readonly filePath: string;
  private matcher: (result: ClassificationResult) => boolean;
  private doc: CategoryStoreDocument | null = null;

  constructor(options: CategoryStoreOptions) {
    this.name = options.name;
    this.filePath = options.filePath;
    this.matcher = options.matches;
  }

  /**
   * Load the document from disk. An absent file is created empty; a legacy
   * document is migrated and written back. With `readOnly`, both happen in
   * memory only.
   */
  load(now: Date = new Date(), options: LoadOptions = {}): CategoryStoreDocument {
    const raw = readJsonFile(this.filePath);

    if (raw === null) {
      this.doc = emptyStoreDocument(now);
      if (!options.readOnly) {
        writeJsonFile(this.filePath, this.doc);
        logger.info('Created category store', { store: this.name, file: this.filePath });
      }
      return this.doc;
    }

    const { doc, migrated } = migrateStoreDocument(raw, now, this.filePath);
    this.doc = doc;
    if (migrated && !options.readOnly) {
      writeJsonFile(this.filePath, this.doc);
      logger.info('Migrated category store', { store: this.name, entries: this.size });
    }
    return this.doc;
  }

  matches(result: ClassificationResult): boolean {
    return this.matcher(result);
  }

  /**
   * Insert or replace the entry for result.appid. Returns true when the
   * stored content changed.
   */
  upsert(result: ClassificationResult): boolean {
    const doc = this.document();
    const key = String(result.appid);
    const existing = doc.entries[key];
    const next: ClassificationResult = { ...result };

    if (existing && JSON.stringify(existing) === JSON.stringify(next)) {
      return false;
    }
    doc.entries[key] = next;
    return true;
  }

  touch(now: Date): void {
    this.document()._metadata.updated = now.toISOString();
  }

  save(): void {
    writeJsonFile(this.filePath, this.document());
  }

  get(appid: number): ClassificationResult | undefined {
    return this.document().entries[String(appid)];
  }

  get size(): number {
    return Object.keys(this.document().entries).length;
  }

  get metadata(): StoreMetadata {
    return { ...this.document()._metadata };
  }

  private document(): CategoryStoreDocument {
    if (!this.doc) {
      this.doc = this.load();
    }
    return this.doc;
  }
}
