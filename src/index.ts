/**
 * Library entry point. The CLI lives in ./cli.
 */

export * from './types';
export * from './errors';
export { logger, setLogLevel, getLogLevel } from './logger';
export type { LogLevel, LogFields } from './logger';
export { loadConfig, DEFAULT_CONFIG, envSchema } from './config';
export type { EnricherConfig, EnvConfig } from './config';
export { SteamStoreClient, classifyHttpError, parseAppDetails } from './apiClient';
export type { AppDetailsSource, AppListSource, SteamStoreClientConfig } from './apiClient';
export { classify, supportsLanguage, hasFeatureTag, productType, resolveFeatureTagId } from './classifier';
export type { ClassifierOptions } from './classifier';
export { createPool, closePool } from './database/index';
export { PgLedgerRepository } from './database/ledgerRepository';
export type { LedgerRepository } from './database/ledgerRepository';
export { CategoryStore } from './storage/categoryStore';
export type { LoadOptions } from './storage/categoryStore';
export { QuarantineStore } from './storage/quarantineStore';
export { ResultSink, createResultSink } from './resultSink';
export type { StoreFlushResult } from './resultSink';
export { BatchSelector } from './batchSelector';
export { EnrichmentWorker } from './worker';
export { syncCatalog } from './catalogSync';
export { Orchestrator } from './orchestrator';
export type { OrchestratorDeps } from './orchestrator';
export { RateLimiter, WorkerPool } from './utils';
