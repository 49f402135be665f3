import { Worker, type Job } from 'bullmq';

import { createJobContext, runWithContext } from '../request-context';
import { getLogger, toError } from '../logger';
import type { RedisConnectionOptions } from './bullmq-queue';

const logger = getLogger('bullmq:worker');

export interface CreateWorkerOptions {
  connection: RedisConnectionOptions;
  concurrency: number;
  /** Lock duration in ms; must exceed the longest job run including backoff sleeps */
  lockDuration: number;
}

/**
* Create a BullMQ worker whose processor runs inside a request context keyed
* by the job id, so every log line of one job correlates.
*
* The caller owns the returned worker and must close() it on shutdown.
*/
export function createWorker<T, R>(
  name: string,
  processor: (job: Job<T>) => Promise<R>,
  options: CreateWorkerOptions
): Worker<T, R> {
  const worker = new Worker<T, R>(name, async (job: Job<T>) => {
    return runWithContext(createJobContext(job.id, job.name), () => processor(job));
  }, {
    connection: options.connection,
    concurrency: options.concurrency,
    lockDuration: options.lockDuration,
    stalledInterval: 30_000,
    maxStalledCount: 3,
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, { queue: name, jobId: job?.id });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', toError(err), { queue: name });
  });

  worker.on('stalled', (jobId: string) => {
    logger.warn('Job stalled - possible worker crash', { queue: name, jobId });
  });

  return worker;
}
