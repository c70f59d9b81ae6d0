/**
 * Terminal rendering of run reports and ledger status.
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { LedgerStats, RunReport } from './types';

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
}

function statusLabel(status: RunReport['status']): string {
  switch (status) {
    case 'completed':
      return chalk.green(status);
    case 'nothing-to-do':
      return chalk.dim(status);
    case 'stopped':
      return chalk.yellow(status);
  }
}

/**
 * Plain-object form of a report, for `--json` output or a wrapping scheduler.
 */
export function reportToJson(report: RunReport): Record<string, unknown> {
  return {
    ...report,
    startedAt: report.startedAt.toISOString(),
    finishedAt: report.finishedAt.toISOString(),
    durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
  };
}

export function printRunReport(report: RunReport): void {
  const duration = report.finishedAt.getTime() - report.startedAt.getTime();

  console.log(chalk.cyan.bold('\n' + '═'.repeat(50)));
  console.log(chalk.cyan.bold('  ENRICHMENT RUN'));
  console.log(chalk.cyan.bold('═'.repeat(50)));
  console.log(`Status: ${statusLabel(report.status)}   Duration: ${formatDuration(duration)}`);

  const counts = new Table({
    head: [chalk.cyan('Stage'), chalk.cyan('Count')],
  });
  counts.push(
    ['Seeded', String(report.seeded)],
    ['Probed', String(report.probed)],
    ['Probe classified', String(report.probeSucceeded)],
    ['Processed', String(report.processed)],
    ['Succeeded', chalk.green(String(report.succeeded))],
    ['Failed', report.failed > 0 ? chalk.red(String(report.failed)) : '0'],
    ['Retry ceiling reached', String(report.exhausted)]
  );
  console.log(counts.toString());

  printStoreTotals(report.storeTotals);

  if (report.flushErrors.length > 0) {
    console.log(chalk.red.bold('\nFlush errors'));
    for (const { store, error } of report.flushErrors) {
      console.log(chalk.red(`  ${store}: ${error}`));
    }
  }
}

export function printStoreTotals(totals: Record<string, number>): void {
  const table = new Table({
    head: [chalk.cyan('Category store'), chalk.cyan('Entries')],
  });
  for (const [store, count] of Object.entries(totals)) {
    table.push([store, String(count)]);
  }
  console.log(table.toString());
}

export function printStatus(stats: LedgerStats, totals: Record<string, number>, quarantined: number): void {
  const pct = (n: number) => (stats.total > 0 ? `${((n / stats.total) * 100).toFixed(1)}%` : '-');

  console.log(chalk.bold('\nLedger'));
  const table = new Table({
    head: [chalk.cyan('Metric'), chalk.cyan('Count'), chalk.cyan('Share')],
  });
  table.push(
    ['Identifiers', String(stats.total), ''],
    ['Fetched', String(stats.fetched), pct(stats.fetched)],
    ['Classified', String(stats.classified), pct(stats.classified)],
    ['Games', String(stats.games), pct(stats.games)],
    ['Retry ceiling reached', String(stats.exhausted), pct(stats.exhausted)],
    ['Quarantined', String(quarantined), '']
  );
  console.log(table.toString());

  printStoreTotals(totals);
}
