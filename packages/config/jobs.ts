/**
 * Publication Queue Configuration
 */

import { parseIntEnv } from './env';

export const publishingConfig = {
  /** BullMQ queue carrying one job per publication attempt */
  queueName: 'publications',

  /** Jobs processed concurrently per worker process */
  workerConcurrency: parseIntEnv('PUBLISH_WORKER_CONCURRENCY', 5, { min: 1, max: 100 }),

  /** Transient failures retried in-worker before the attempt is marked failed */
  maxRetries: parseIntEnv('PUBLISH_MAX_RETRIES', 3, { min: 0, max: 20 }),

  /** Fixed delay between transient retries */
  retryDelayMs: parseIntEnv('PUBLISH_RETRY_DELAY_MS', 60_000, { min: 0, max: 600_000 }),

  /** Upper bound for one publish call to a network */
  publishTimeoutMs: parseIntEnv('PUBLISH_TIMEOUT_MS', 30_000, { min: 1_000, max: 300_000 }),

  /** Upper bound for a whole job, backoff sleeps included */
  jobTimeoutMs: parseIntEnv('PUBLISH_JOB_TIMEOUT_MS', 300_000, { min: 10_000, max: 3_600_000 }),
} as const;

Object.freeze(publishingConfig);
