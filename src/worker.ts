/**
 * Fetch/classify worker: one rate-limited detail request per identifier,
 * mapped to an outcome. The worker never persists anything; the orchestrator
 * decides what the outcome means for the ledger and the stores.
 */

import { AppDetailsSource } from './apiClient';
import { ClassifierOptions, classify } from './classifier';
import {
  ApiReportedFailureError,
  ParseError,
  RateLimitedError,
  TransportError,
  errorMessage,
} from './errors';
import { logger } from './logger';
import { RateLimiter, sleep as realSleep } from './utils/rateLimiter';
import { AppDetailsData, ClassificationOutcome, FailureOutcome } from './types';

export interface WorkerOptions {
  rateLimitCooldownMs: number;
  classifier: ClassifierOptions;
  now: () => Date;
  sleep: (ms: number) => Promise<void>;
}

type FetchResult = { kind: 'ok'; appid: number; data: AppDetailsData } | FailureOutcome;

export class EnrichmentWorker {
  private source: AppDetailsSource;
  private limiter: RateLimiter;
  private options: WorkerOptions;
  private cooldown: Promise<void> | null = null;
  private cooldowns: number = 0;

  constructor(source: AppDetailsSource, limiter: RateLimiter, options: Partial<WorkerOptions> & Pick<WorkerOptions, 'classifier'>) {
    this.source = source;
    this.limiter = limiter;
    this.options = {
      rateLimitCooldownMs: 5 * 60 * 1000,
      now: () => new Date(),
      sleep: realSleep,
      ...options,
    };
  }

  /**
   * Fetch and classify one identifier.
   */
  async process(appid: number): Promise<ClassificationOutcome> {
    const fetched = await this.fetch(appid);
    if (fetched.kind !== 'ok') {
      return fetched;
    }

    const result = classify(appid, fetched.data, this.options.classifier, this.options.now());
    return { kind: 'success', appid, result };
  }

  /** Number of 429 cool-downs entered during this worker's lifetime. */
  get cooldownCount(): number {
    return this.cooldowns;
  }

  private async fetch(appid: number): Promise<FetchResult> {
    if (this.cooldown) {
      await this.cooldown;
    }
    await this.limiter.awaitSlot();

    const started = this.options.now().getTime();
    try {
      const data = await this.source.getAppDetails(appid);
      this.limiter.recordResponseTime(this.options.now().getTime() - started);
      return { kind: 'ok', appid, data };
    } catch (error) {
      this.limiter.recordResponseTime(this.options.now().getTime() - started);
      return this.mapFailure(appid, error);
    }
  }

  private async mapFailure(appid: number, error: unknown): Promise<FailureOutcome> {
    if (error instanceof RateLimitedError) {
      await this.enterCooldown(appid);
      return { kind: 'retryable', appid, reason: 'rate-limited', error: error.message };
    }
    if (error instanceof TransportError) {
      return { kind: 'retryable', appid, reason: 'transport-error', error: error.message };
    }
    if (error instanceof ApiReportedFailureError) {
      return { kind: 'permanent', appid, reason: 'api-reported-failure', error: error.message };
    }
    if (error instanceof ParseError) {
      return { kind: 'permanent', appid, reason: 'parse-error', error: error.message };
    }

    logger.error('Unexpected error from detail source', { appid, error: errorMessage(error) });
    throw error;
  }

  /**
   * Pause every caller of this worker for the cool-down. Concurrent 429s
   * share one pause.
   */
  private async enterCooldown(appid: number): Promise<void> {
    if (!this.cooldown) {
      this.cooldowns++;
      logger.warn('Rate limited by remote, pausing worker', {
        appid,
        cooldownMs: this.options.rateLimitCooldownMs,
      });
      this.cooldown = this.options.sleep(this.options.rateLimitCooldownMs).finally(() => {
        this.cooldown = null;
      });
    }
    await this.cooldown;
  }
}
