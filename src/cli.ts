#!/usr/bin/env node
/**
 * CLI entry point for the AppID enrichment crawler.
 *
 * Commands:
 *   appid-enricher run           - Run one enrichment pass
 *   appid-enricher sync-catalog  - Insert newly listed AppIDs into the ledger
 *   appid-enricher status        - Show ledger progress and store totals
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { SteamStoreClient } from './apiClient';
import { syncCatalog } from './catalogSync';
import { EnricherConfig, loadConfig } from './config';
import { closePool, createPool } from './database/index';
import { PgLedgerRepository } from './database/ledgerRepository';
import { errorMessage } from './errors';
import { logger, setLogLevel } from './logger';
import { Orchestrator } from './orchestrator';
import { printRunReport, printStatus, reportToJson } from './report';
import { createResultSink } from './resultSink';

/** Exit code when the run finished but a store could not be written. */
const EXIT_FLUSH_FAILED = 2;

function parseCount(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function configure(): EnricherConfig {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return config;
}

function createClient(config: EnricherConfig): SteamStoreClient {
  return new SteamStoreClient({
    appListUrl: config.appListUrl,
    appDetailsUrl: config.appDetailsUrl,
    locale: config.locale,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

const program = new Command();

program
  .name('appid-enricher')
  .description('Resumable, rate-limited enrichment of Steam AppIDs')
  .version('1.0.0');

/**
 * Run command - one pass of seed, probe, classify, flush.
 */
program
  .command('run')
  .description('Run one enrichment pass over the next batch of AppIDs')
  .option('--batch-size <n>', 'AppIDs to classify in this run', parsePositive)
  .option('--probe-batch-size <n>', 'Unfetched AppIDs to probe in this run (0 disables)', parseCount)
  .option('--concurrency <n>', 'Requests in flight at once', parsePositive)
  .option('--json', 'Print the run report as JSON')
  .action(async (options: { batchSize?: number; probeBatchSize?: number; concurrency?: number; json?: boolean }) => {
    const config = configure();
    if (options.batchSize !== undefined) config.batchSize = options.batchSize;
    if (options.probeBatchSize !== undefined) config.probeBatchSize = options.probeBatchSize;
    if (options.concurrency !== undefined) config.concurrency = options.concurrency;

    const pool = createPool(config);
    const client = createClient(config);
    const orchestrator = new Orchestrator(config, {
      ledger: new PgLedgerRepository(pool),
      catalog: client,
      details: client,
      sink: createResultSink(config),
    });

    // Stop between identifiers
    const shutdown = (signal: string) => {
      logger.warn(`Received ${signal}`);
      orchestrator.requestStop();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    try {
      const report = await orchestrator.run();
      if (options.json) {
        console.log(JSON.stringify(reportToJson(report), null, 2));
      } else {
        printRunReport(report);
      }
      if (report.flushErrors.length > 0) {
        process.exitCode = EXIT_FLUSH_FAILED;
      }
    } finally {
      await closePool(pool);
    }
  });

/**
 * Sync-catalog command - pull the app list and add new AppIDs.
 */
program
  .command('sync-catalog')
  .description('Fetch the full app list and insert AppIDs the ledger does not know yet')
  .action(async () => {
    const config = configure();
    const pool = createPool(config);
    try {
      const ledger = new PgLedgerRepository(pool);
      await ledger.initialize();
      const result = await syncCatalog(createClient(config), ledger);
      console.log(`Listed ${result.listed} AppIDs, added ${result.added} new (${result.durationMs}ms)`);
    } finally {
      await closePool(pool);
    }
  });

/**
 * Status command - ledger progress and category store totals.
 */
program
  .command('status')
  .description('Show ledger progress and category store totals')
  .option('--json', 'Print status as JSON')
  .action(async (options: { json?: boolean }) => {
    const config = configure();
    const pool = createPool(config);
    try {
      const ledger = new PgLedgerRepository(pool);
      await ledger.initialize();
      const stats = await ledger.stats(config.retryCeiling);

      const sink = createResultSink(config);
      sink.load(new Date(), { readOnly: true });
      const totals = sink.totals();

      if (options.json) {
        console.log(JSON.stringify({ ledger: stats, stores: totals, quarantined: sink.quarantine.size }, null, 2));
      } else {
        printStatus(stats, totals, sink.quarantine.size);
      }
    } finally {
      await closePool(pool);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', { error: errorMessage(error) });
  process.exit(1);
});
