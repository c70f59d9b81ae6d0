/**
 * Orchestrator: drives one enrichment pass.
 *
 *   SeedingLedger -> ProbingCatalog -> SelectingBatch -> ProcessingBatch
 *     -> FlushingResults -> Done
 *
 * Every invocation is a fresh state machine reading durable state; nothing
 * carries over between runs except the ledger and the stores. Per-identifier
 * ledger updates are committed as each outcome arrives, so a crash loses at
 * most the identifier in flight. Category stores are flushed once at the end.
 */

import { AppDetailsSource, AppListSource } from './apiClient';
import { BatchSelector } from './batchSelector';
import { syncCatalog } from './catalogSync';
import { EnricherConfig } from './config';
import { LedgerRepository } from './database/ledgerRepository';
import { errorMessage } from './errors';
import { logger } from './logger';
import { ResultSink } from './resultSink';
import { RateLimiter, sleep as realSleep } from './utils/rateLimiter';
import { WorkerPool } from './utils/workerPool';
import { EnrichmentWorker } from './worker';
import {
  ClassificationOutcome,
  ClassificationResult,
  FailureOutcome,
  RunReport,
  RunState,
} from './types';

export interface OrchestratorDeps {
  ledger: LedgerRepository;
  catalog: AppListSource;
  details: AppDetailsSource;
  sink: ResultSink;
  limiter?: RateLimiter;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export class Orchestrator {
  private config: EnricherConfig;
  private ledger: LedgerRepository;
  private catalog: AppListSource;
  private sink: ResultSink;
  private selector: BatchSelector;
  private worker: EnrichmentWorker;
  private now: () => Date;
  private state: RunState = 'Idle';
  private stopRequested: boolean = false;

  constructor(config: EnricherConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.ledger = deps.ledger;
    this.catalog = deps.catalog;
    this.sink = deps.sink;
    this.now = deps.now ?? (() => new Date());

    const sleep = deps.sleep ?? realSleep;
    const limiter =
      deps.limiter ??
      new RateLimiter({
        requestsPerMinute: config.requestsPerMinute,
        slowResponseThresholdMs: config.slowResponseThresholdMs,
        slowResponseDelayMs: config.slowResponseDelayMs,
        now: () => this.now().getTime(),
        sleep,
      });

    this.selector = new BatchSelector(this.ledger, {
      batchSize: config.batchSize,
      probeBatchSize: config.probeBatchSize,
      retryCeiling: config.retryCeiling,
      stalenessWindowDays: config.stalenessWindowDays,
    });

    this.worker = new EnrichmentWorker(deps.details, limiter, {
      rateLimitCooldownMs: config.rateLimitCooldownMs,
      classifier: { language: config.language, featureTag: config.featureTag },
      now: this.now,
      sleep,
    });
  }

  get currentState(): RunState {
    return this.state;
  }

  /**
   * Ask the run to stop after the identifiers currently in flight. Results
   * gathered so far are still flushed.
   */
  requestStop(): void {
    if (!this.stopRequested) {
      logger.warn('Stop requested, finishing in-flight identifiers', { state: this.state });
    }
    this.stopRequested = true;
  }

  async run(): Promise<RunReport> {
    const report: RunReport = {
      status: 'completed',
      startedAt: this.now(),
      finishedAt: this.now(),
      seeded: 0,
      probed: 0,
      probeSucceeded: 0,
      processed: 0,
      succeeded: 0,
      failed: 0,
      exhausted: 0,
      storeTotals: {},
      flushErrors: [],
    };

    this.transition('SeedingLedger');
    await this.seedLedger(report);

    const results: ClassificationResult[] = [];
    try {
      if (this.config.probeBatchSize > 0 && !this.stopRequested) {
        this.transition('ProbingCatalog');
        await this.probeCatalog(results, report);
      }

      this.transition('SelectingBatch');
      const batch = this.stopRequested ? [] : await this.selector.selectBatch(this.now());

      if (batch.length === 0) {
        logger.info('No identifiers need classification', { stopped: this.stopRequested });
        if (this.stopRequested) {
          report.status = 'stopped';
        } else if (report.probed === 0) {
          report.status = 'nothing-to-do';
        }
      } else {
        logger.info('Batch selected', { size: batch.length, first: batch[0], last: batch[batch.length - 1] });
        this.transition('ProcessingBatch');
        const stopped = await this.processBatch(batch, results, report);
        if (stopped) report.status = 'stopped';
      }
    } catch (error) {
      // Ledger failure: keep what the ledger already committed consistent
      // with the stores and the quarantine record, then abort.
      logger.error('Run aborted', {
        state: this.state,
        error: errorMessage(error),
        probed: report.probed,
        processed: report.processed,
      });
      this.transition('FlushingResults');
      this.flush(results, report);
      throw error;
    }

    this.transition('FlushingResults');
    this.flush(results, report);

    return this.finish(report);
  }

  private async seedLedger(report: RunReport): Promise<void> {
    await this.ledger.initialize();
    this.sink.load(this.now());

    const known = await this.ledger.count();
    if (known > 0) {
      logger.info('Ledger ready', { identifiers: known });
      return;
    }

    logger.info('Ledger is empty, seeding from app list');
    const result = await syncCatalog(this.catalog, this.ledger, () => this.now().getTime());
    report.seeded = result.added;
  }

  /**
   * Fetch identifiers whose details were never retrieved. A payload that
   * comes back is classified on the spot, so no identifier is requested twice
   * in one run.
   */
  private async probeCatalog(results: ClassificationResult[], report: RunReport): Promise<void> {
    const ids = await this.selector.selectProbeBatch();
    if (ids.length === 0) {
      logger.info('No unfetched identifiers to probe');
      return;
    }

    logger.info('Probing unfetched identifiers', { size: ids.length });
    const pool = this.createPool();
    await pool.executeAll(
      ids.map((appid) => async () => {
        const outcome = await this.worker.process(appid);
        await this.applyProbeOutcome(outcome, results, report);
      })
    );

    logger.info('Probe complete', { probed: report.probed, classified: report.probeSucceeded });
  }

  private async processBatch(
    batch: number[],
    results: ClassificationResult[],
    report: RunReport
  ): Promise<boolean> {
    const pool = this.createPool();
    const poolResult = await pool.executeAll(
      batch.map((appid) => async () => {
        const outcome = await this.worker.process(appid);
        await this.applyOutcome(outcome, results, report);
      }),
      (progress) => {
        if (progress.completed % 25 === 0 || progress.completed === progress.total) {
          logger.info('Batch progress', { completed: progress.completed, total: progress.total });
        }
      }
    );

    logger.info('Batch processed', {
      processed: report.processed,
      succeeded: report.succeeded,
      failed: report.failed,
      exhausted: report.exhausted,
    });
    return poolResult.stopped;
  }

  private async applyOutcome(
    outcome: ClassificationOutcome,
    results: ClassificationResult[],
    report: RunReport
  ): Promise<void> {
    report.processed++;

    if (outcome.kind === 'success') {
      await this.commitResult(outcome.result, results);
      report.succeeded++;
      return;
    }

    report.failed++;
    await this.recordFailure(outcome, report);
  }

  private async applyProbeOutcome(
    outcome: ClassificationOutcome,
    results: ClassificationResult[],
    report: RunReport
  ): Promise<void> {
    report.probed++;

    if (outcome.kind === 'success') {
      await this.commitResult(outcome.result, results);
      report.probeSucceeded++;
      return;
    }

    await this.recordFailure(outcome, report);
  }

  /**
   * Mark the identifier classified in the ledger, then queue its result for
   * the store flush.
   */
  private async commitResult(result: ClassificationResult, results: ClassificationResult[]): Promise<void> {
    await this.ledger.markClassified(result.appid, result.type === 'game', this.now());
    results.push(result);
    logger.info('Classified appid', {
      appid: result.appid,
      type: result.type,
      language: result.supportsLanguage,
      feature: result.hasFeatureTag,
    });
  }

  /**
   * Count a failure against the identifier. Permanent failures are
   * quarantined straight away; any failure that reaches the retry ceiling is
   * quarantined when the ledger closes the identifier. Nothing is quarantined
   * unless the ledger update committed.
   */
  private async recordFailure(outcome: FailureOutcome, report: RunReport): Promise<void> {
    const now = this.now();
    const update = await this.ledger.recordFailure(outcome.appid, this.config.retryCeiling, now);

    if (outcome.kind === 'permanent') {
      this.sink.recordFailure(outcome.appid, outcome.reason, now);
    }

    logger.warn('Appid failed', {
      appid: outcome.appid,
      kind: outcome.kind,
      reason: outcome.reason,
      retryCount: update.retryCount,
      error: outcome.error,
    });

    if (update.exhausted) {
      report.exhausted++;
      this.sink.recordFailure(outcome.appid, `retry-ceiling-reached:${outcome.reason}`, now);
      logger.warn('Retry ceiling reached, closing appid', {
        appid: outcome.appid,
        retryCount: update.retryCount,
      });
    }
  }

  private flush(results: ClassificationResult[], report: RunReport): void {
    const outcomes = [...this.sink.merge(results, this.now()), this.sink.flushQuarantine()];
    for (const outcome of outcomes) {
      if (outcome.status === 'failed') {
        report.flushErrors.push({ store: outcome.store, error: outcome.error ?? 'unknown error' });
      }
    }
  }

  private finish(report: RunReport): RunReport {
    report.storeTotals = this.sink.totals();
    report.finishedAt = this.now();
    this.transition('Done');

    logger.info('Run finished', {
      status: report.status,
      processed: report.processed,
      succeeded: report.succeeded,
      failed: report.failed,
      exhausted: report.exhausted,
      flushErrors: report.flushErrors.length,
      ...report.storeTotals,
    });
    return report;
  }

  private createPool(): WorkerPool {
    return new WorkerPool({
      concurrency: this.config.concurrency,
      shouldStop: () => this.stopRequested,
    });
  }

  private transition(next: RunState): void {
    logger.info('State transition', { from: this.state, to: next });
    this.state = next;
  }
}
