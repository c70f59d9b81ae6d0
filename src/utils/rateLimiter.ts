/**
 * Rate limiting utilities for API calls
 */

export interface RateLimiterOptions {
  requestsPerMinute: number;
  windowMs: number;
  slowResponseThresholdMs: number;
  slowResponseDelayMs: number;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: RateLimiterOptions = {
  requestsPerMinute: 200,
  windowMs: 60_000,
  slowResponseThresholdMs: 500,
  slowResponseDelayMs: 200,
  now: () => Date.now(),
  sleep,
};

/**
 * Sliding-window limiter: at most `requestsPerMinute` acquisitions within any
 * trailing `windowMs`. A slow previous response adds a short pause after the
 * slot is taken.
 *
 * tryAcquire() is synchronous, so workers sharing one instance on the event
 * loop can never both take the last slot.
 */
export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly slowResponseThresholdMs: number;
  private readonly slowResponseDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private timestamps: number[] = [];
  private lastResponseMs: number = 0;

  constructor(options: Partial<RateLimiterOptions> = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.maxRequests = opts.requestsPerMinute;
    this.windowMs = opts.windowMs;
    this.slowResponseThresholdMs = opts.slowResponseThresholdMs;
    this.slowResponseDelayMs = opts.slowResponseDelayMs;
    this.now = opts.now;
    this.sleep = opts.sleep;
  }

  tryAcquire(): boolean {
    const now = this.now();
    this.prune(now);
    if (this.timestamps.length >= this.maxRequests) {
      return false;
    }
    this.timestamps.push(now);
    return true;
  }

  async awaitSlot(): Promise<void> {
    while (!this.tryAcquire()) {
      await this.sleep(Math.max(1, this.msUntilNextSlot()));
    }

    if (this.lastResponseMs > this.slowResponseThresholdMs) {
      await this.sleep(this.slowResponseDelayMs);
    }
  }

  recordResponseTime(durationMs: number): void {
    this.lastResponseMs = durationMs;
  }

  /**
   * Milliseconds until the oldest request in the window ages out; 0 when a
   * slot is free now.
   */
  msUntilNextSlot(): number {
    const now = this.now();
    this.prune(now);
    if (this.timestamps.length < this.maxRequests) {
      return 0;
    }
    return this.timestamps[0] + this.windowMs - now;
  }

  get inWindow(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  get lastResponseTime(): number {
    return this.lastResponseMs;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.timestamps.length && this.timestamps[drop] <= cutoff) {
      drop++;
    }
    if (drop > 0) {
      this.timestamps = this.timestamps.slice(drop);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
