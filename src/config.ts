/**
 * Configuration for the enrichment crawler.
 *
 * The orchestrator receives an explicit EnricherConfig; nothing reads
 * process.env after loadConfig() has run.
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { LogLevel } from './logger';

export interface EnricherConfig {
  // Storage
  dataDirectory: string;           // Category stores and quarantine record live here
  databaseUrl: string;             // Ledger connection string
  databaseSsl: boolean;

  // Throttle
  requestsPerMinute: number;       // Sliding-window ceiling
  slowResponseThresholdMs: number; // Latency above this adds slowResponseDelayMs
  slowResponseDelayMs: number;
  rateLimitCooldownMs: number;     // Worker pause after a 429
  requestTimeoutMs: number;
  concurrency: number;             // 1 = strictly sequential

  // Batching and retry policy
  batchSize: number;               // Classification batch per run
  probeBatchSize: number;          // Unfetched identifiers probed per run (0 disables)
  retryCeiling: number;            // Consecutive failures before forced closure
  stalenessWindowDays: number;     // Age after which a classification is re-checked
  quarantineRetentionDays: number;

  // Remote endpoints and classification dimensions
  appListUrl: string;
  appDetailsUrl: string;
  locale: string;                  // Sent as `l=` to the detail endpoint
  language: string;                // Language checked for the language-support store
  featureTag: string;              // Feature checked for the feature-tag store

  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: EnricherConfig = {
  dataDirectory: path.join(process.cwd(), 'data'),
  databaseUrl: 'postgres://localhost:5432/appids',
  databaseSsl: false,

  requestsPerMinute: 200,
  slowResponseThresholdMs: 500,
  slowResponseDelayMs: 200,
  rateLimitCooldownMs: 5 * 60 * 1000,
  requestTimeoutMs: 15000,
  concurrency: 1,

  batchSize: 100,
  probeBatchSize: 200,
  retryCeiling: 3,
  stalenessWindowDays: 30,
  quarantineRetentionDays: 30,

  appListUrl: 'https://api.steampowered.com/ISteamApps/GetAppList/v2/',
  appDetailsUrl: 'https://store.steampowered.com/api/appdetails',
  locale: 'english',
  language: 'schinese',
  featureTag: 'trading-cards',

  logLevel: 'info',
};

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variables understood by loadConfig().
 */
export const envSchema = z.object({
  DATA_DIR: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_SSL: flag.optional(),
  ENRICHER_REQUESTS_PER_MINUTE: positiveInt.optional(),
  ENRICHER_SLOW_RESPONSE_MS: nonNegativeInt.optional(),
  ENRICHER_SLOW_RESPONSE_DELAY_MS: nonNegativeInt.optional(),
  ENRICHER_COOLDOWN_MS: nonNegativeInt.optional(),
  ENRICHER_TIMEOUT_MS: positiveInt.optional(),
  ENRICHER_CONCURRENCY: positiveInt.optional(),
  ENRICHER_BATCH_SIZE: positiveInt.optional(),
  ENRICHER_PROBE_BATCH_SIZE: nonNegativeInt.optional(),
  ENRICHER_RETRY_CEILING: positiveInt.optional(),
  ENRICHER_STALENESS_DAYS: positiveInt.optional(),
  ENRICHER_QUARANTINE_RETENTION_DAYS: positiveInt.optional(),
  STEAM_APP_LIST_URL: z.string().url().optional(),
  STEAM_APP_DETAILS_URL: z.string().url().optional(),
  ENRICHER_LOCALE: z.string().min(1).optional(),
  ENRICHER_LANGUAGE: z.string().min(1).optional(),
  ENRICHER_FEATURE_TAG: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Build a config from environment variables on top of DEFAULT_CONFIG.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnricherConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Configuration validation failed: ${errors}`, {
      variables: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const e = result.data;
  const base = DEFAULT_CONFIG;

  return {
    dataDirectory: e.DATA_DIR ? path.resolve(e.DATA_DIR) : base.dataDirectory,
    databaseUrl: e.DATABASE_URL ?? base.databaseUrl,
    databaseSsl: e.DATABASE_SSL ?? base.databaseSsl,

    requestsPerMinute: e.ENRICHER_REQUESTS_PER_MINUTE ?? base.requestsPerMinute,
    slowResponseThresholdMs: e.ENRICHER_SLOW_RESPONSE_MS ?? base.slowResponseThresholdMs,
    slowResponseDelayMs: e.ENRICHER_SLOW_RESPONSE_DELAY_MS ?? base.slowResponseDelayMs,
    rateLimitCooldownMs: e.ENRICHER_COOLDOWN_MS ?? base.rateLimitCooldownMs,
    requestTimeoutMs: e.ENRICHER_TIMEOUT_MS ?? base.requestTimeoutMs,
    concurrency: e.ENRICHER_CONCURRENCY ?? base.concurrency,

    batchSize: e.ENRICHER_BATCH_SIZE ?? base.batchSize,
    probeBatchSize: e.ENRICHER_PROBE_BATCH_SIZE ?? base.probeBatchSize,
    retryCeiling: e.ENRICHER_RETRY_CEILING ?? base.retryCeiling,
    stalenessWindowDays: e.ENRICHER_STALENESS_DAYS ?? base.stalenessWindowDays,
    quarantineRetentionDays: e.ENRICHER_QUARANTINE_RETENTION_DAYS ?? base.quarantineRetentionDays,

    appListUrl: e.STEAM_APP_LIST_URL ?? base.appListUrl,
    appDetailsUrl: e.STEAM_APP_DETAILS_URL ?? base.appDetailsUrl,
    locale: e.ENRICHER_LOCALE ?? base.locale,
    language: e.ENRICHER_LANGUAGE ?? base.language,
    featureTag: e.ENRICHER_FEATURE_TAG ?? base.featureTag,

    logLevel: e.LOG_LEVEL ?? base.logLevel,
  };
}

export const DAY_MS = 24 * 60 * 60 * 1000;
