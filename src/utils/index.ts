/**
 * Shared utilities
 */

export { RateLimiter, sleep, type RateLimiterOptions } from './rateLimiter';
export {
  WorkerPool,
  type WorkerPoolOptions,
  type BatchProgress,
  type PoolResult,
} from './workerPool';
