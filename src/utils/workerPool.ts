/**
 * Bounded worker pool for running per-identifier tasks with a fixed number in
 * flight. Throughput is governed by the shared RateLimiter the tasks use; the
 * pool only caps concurrency.
 */

export interface WorkerPoolOptions {
  concurrency: number;
  /** Checked before each task is started; returning true stops dispatching. */
  shouldStop?: () => boolean;
}

export interface BatchProgress {
  completed: number;
  total: number;
  startTime: number;
  elapsedMs: number;
  ratePerSecond: number;
}

export interface PoolResult<T> {
  results: T[];          // Results of completed tasks, in input order
  completed: number;
  stopped: boolean;      // true when shouldStop() cut the batch short
}

const DEFAULT_OPTIONS: WorkerPoolOptions = {
  concurrency: 3,
};

export class WorkerPool {
  private concurrency: number;
  private shouldStop: () => boolean;

  constructor(options: Partial<WorkerPoolOptions> = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.concurrency = Math.max(1, Math.floor(opts.concurrency));
    this.shouldStop = opts.shouldStop ?? (() => false);
  }

  /**
   * Run every task with at most `concurrency` in flight.
   *
   * The first task to throw stops further dispatch; tasks already running are
   * allowed to finish, then that error is rethrown.
   */
  async executeAll<T>(
    tasks: Array<() => Promise<T>>,
    onProgress?: (progress: BatchProgress) => void
  ): Promise<PoolResult<T>> {
    const slots: Array<T | undefined> = new Array(tasks.length);
    const done: boolean[] = new Array(tasks.length).fill(false);
    const startTime = Date.now();
    let cursor = 0;
    let completed = 0;
    let stopped = false;
    const failures: unknown[] = [];

    const runner = async (): Promise<void> => {
      while (cursor < tasks.length && failures.length === 0) {
        if (this.shouldStop()) {
          stopped = true;
          return;
        }

        const index = cursor++;
        try {
          slots[index] = await tasks[index]();
          done[index] = true;
        } catch (error) {
          failures.push(error);
          return;
        }

        completed++;
        if (onProgress) {
          const elapsedMs = Date.now() - startTime;
          onProgress({
            completed,
            total: tasks.length,
            startTime,
            elapsedMs,
            ratePerSecond: elapsedMs > 0 ? completed / (elapsedMs / 1000) : 0,
          });
        }
      }
    };

    const runners = Math.min(this.concurrency, tasks.length);
    await Promise.all(Array.from({ length: runners }, () => runner()));

    if (failures.length > 0) {
      throw failures[0];
    }

    const results: T[] = [];
    slots.forEach((value, index) => {
      if (done[index] && value !== undefined) results.push(value);
    });

    return { results, completed, stopped };
  }
}
