/**
 * Shared types for the enrichment pipeline.
 */

// ============================================================================
// Ledger
// ============================================================================

export interface IdentifierRecord {
  appid: number;
  fetched: boolean;
  classified: boolean;
  isGame: boolean;
  retryCount: number;
  classifiedAt: Date | null;
  lastUpdated: Date;
}

export interface FailureUpdate {
  appid: number;
  retryCount: number;
  classified: boolean;
  exhausted: boolean;      // true when this failure hit the retry ceiling
}

export interface LedgerStats {
  total: number;
  fetched: number;
  classified: number;
  games: number;
  exhausted: number;
}

// ============================================================================
// Remote API payloads
// ============================================================================

/**
 * Loosely-typed attribute bag returned under `data` by the detail endpoint.
 * Only the fields used for classification are named; anything may be absent
 * or of an unexpected shape.
 */
export interface AppDetailsData {
  type?: unknown;
  name?: unknown;
  supported_languages?: unknown;
  languages?: unknown;
  categories?: unknown;
  [key: string]: unknown;
}

// ============================================================================
// Classification
// ============================================================================

export interface ClassificationResult {
  appid: number;
  name: string;
  type: string;
  supportsLanguage: boolean;
  hasFeatureTag: boolean;
  lastChecked: string;     // ISO timestamp of the check
}

export type RetryableReason = 'rate-limited' | 'transport-error';
export type PermanentReason = 'api-reported-failure' | 'parse-error';
export type FailureReason = RetryableReason | PermanentReason;

export type FailureOutcome =
  | { kind: 'retryable'; appid: number; reason: RetryableReason; error: string }
  | { kind: 'permanent'; appid: number; reason: PermanentReason; error: string };

export type ClassificationOutcome =
  | { kind: 'success'; appid: number; result: ClassificationResult }
  | FailureOutcome;

// ============================================================================
// Durable documents
// ============================================================================

export interface StoreMetadata {
  created: string;
  updated: string;
  version: number;
}

export interface CategoryStoreDocument {
  _metadata: StoreMetadata;
  entries: Record<string, ClassificationResult>;
}

export interface QuarantineEntry {
  id: number;
  reason: string;
  timestamp: string;
}

export interface QuarantineDocument {
  invalid_or_failed: QuarantineEntry[];
}

// ============================================================================
// Run reporting
// ============================================================================

export type RunState =
  | 'Idle'
  | 'SeedingLedger'
  | 'ProbingCatalog'
  | 'SelectingBatch'
  | 'ProcessingBatch'
  | 'FlushingResults'
  | 'Done';

export type RunStatus = 'completed' | 'nothing-to-do' | 'stopped';

export interface StoreFlushError {
  store: string;
  error: string;
}

export interface RunReport {
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date;
  seeded: number;
  probed: number;
  probeSucceeded: number;
  processed: number;
  succeeded: number;
  failed: number;
  exhausted: number;
  storeTotals: Record<string, number>;
  flushErrors: StoreFlushError[];
}
