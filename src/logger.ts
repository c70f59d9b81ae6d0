/**
 * Timestamped console logger.
 *
 * Lines look like `[2024-05-01T10:00:00.000Z] INFO Batch selected size=100`.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.dim('DEBUG'),
  info: chalk.cyan('INFO'),
  warn: chalk.yellow('WARN'),
  error: chalk.red('ERROR'),
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(/\s/.test(text) ? `${key}="${text}"` : `${key}=${text}`);
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const line = `[${new Date().toISOString()}] ${LEVEL_TAGS[level]} ${message}${formatFields(fields)}`;
  if (level === 'warn') {
    console.warn(line);
  } else if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (message: string, fields?: LogFields) => write('debug', message, fields),
  info: (message: string, fields?: LogFields) => write('info', message, fields),
  warn: (message: string, fields?: LogFields) => write('warn', message, fields),
  error: (message: string, fields?: LogFields) => write('error', message, fields),
};
