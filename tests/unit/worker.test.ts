import { describe, it, expect, vi } from 'vitest';
import { AppDetailsSource } from '../../src/apiClient';
import {
  ApiReportedFailureError,
  ParseError,
  RateLimitedError,
  TransportError,
} from '../../src/errors';
import { AppDetailsData } from '../../src/types';
import { RateLimiter } from '../../src/utils/rateLimiter';
import { EnrichmentWorker } from '../../src/worker';

const NOW = new Date('2024-06-01T00:00:00.000Z');

function setup(getAppDetails: (appid: number) => Promise<AppDetailsData>, sleep = vi.fn(async (_ms: number) => {})) {
  const source: AppDetailsSource = { getAppDetails: vi.fn(getAppDetails) };
  const limiter = new RateLimiter({ now: () => 0, sleep: async () => {} });
  const worker = new EnrichmentWorker(source, limiter, {
    rateLimitCooldownMs: 300_000,
    classifier: { language: 'schinese', featureTag: 'trading-cards' },
    now: () => NOW,
    sleep,
  });
  return { worker, source, sleep };
}

describe('EnrichmentWorker', () => {
  it('classifies a successful payload', async () => {
    const { worker } = setup(async () => ({
      type: 'game',
      name: 'Test Game',
      supported_languages: 'English, Simplified Chinese',
      categories: [{ id: 29 }],
    }));

    await expect(worker.process(10)).resolves.toEqual({
      kind: 'success',
      appid: 10,
      result: {
        appid: 10,
        name: 'Test Game',
        type: 'game',
        supportsLanguage: true,
        hasFeatureTag: true,
        lastChecked: NOW.toISOString(),
      },
    });
  });

  it('maps each error class to its outcome', async () => {
    const errors: Record<number, Error> = {
      1: new TransportError('socket hang up'),
      2: new ApiReportedFailureError(2),
      3: new ParseError('bad body'),
    };
    const { worker } = setup(async (appid) => {
      throw errors[appid];
    });

    await expect(worker.process(1)).resolves.toMatchObject({ kind: 'retryable', reason: 'transport-error' });
    await expect(worker.process(2)).resolves.toMatchObject({ kind: 'permanent', reason: 'api-reported-failure' });
    await expect(worker.process(3)).resolves.toMatchObject({ kind: 'permanent', reason: 'parse-error' });
  });

  it('rethrows errors outside the taxonomy', async () => {
    const { worker } = setup(async () => {
      throw new TypeError('boom');
    });
    await expect(worker.process(1)).rejects.toThrow('boom');
  });

  it('pauses for the cool-down after a 429', async () => {
    const { worker, sleep } = setup(async () => {
      throw new RateLimitedError();
    });

    await expect(worker.process(5)).resolves.toEqual({
      kind: 'retryable',
      appid: 5,
      reason: 'rate-limited',
      error: 'Too Many Requests',
    });
    expect(sleep).toHaveBeenCalledWith(300_000);
    expect(worker.cooldownCount).toBe(1);
  });

  it('shares one cool-down between concurrent 429s', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const sleep = vi.fn((_ms: number) => gate);
    const { worker } = setup(async () => {
      throw new RateLimitedError();
    }, sleep);

    const first = worker.process(1);
    const second = worker.process(2);
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
    release();

    const outcomes = await Promise.all([first, second]);
    expect(outcomes.map((o) => o.kind)).toEqual(['retryable', 'retryable']);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(worker.cooldownCount).toBe(1);
  });
});
