import type { Queue } from 'bullmq';
import { z } from 'zod';

import { createQueue, type RedisConnectionOptions } from '@kernel/queues/bullmq-queue';
import { getLogger } from '@kernel/logger';

import type { PublicationJob, PublicationQueue } from '../../application/ports/PublicationQueue';
import { NETWORKS } from '../../domain/networks';

const logger = getLogger('publishing:queue');

export const PUBLISH_JOB_NAME = 'publish';

/**
* Job payloads come back from Redis untyped; the worker validates them
*/
export const PublicationJobSchema = z.object({
  attemptId: z.string().uuid(),
  network: z.enum(NETWORKS),
  content: z.string(),
  imageUrl: z.string().url().optional(),
});

/**
* PublicationQueue backed by BullMQ.
*
* Jobs get a single BullMQ attempt: transient failures are retried inside the
* worker so the retry counter lives on the publication attempt row.
*/
export class BullMqPublicationQueue implements PublicationQueue {
  private readonly queue: Queue<PublicationJob>;

  constructor(name: string, connection: RedisConnectionOptions) {
  this.queue = createQueue<PublicationJob>(name, {
    connection,
    defaultJobOptions: { attempts: 1 },
  });
  }

  async enqueue(job: PublicationJob): Promise<string> {
  const queued = await this.queue.add(PUBLISH_JOB_NAME, job);
  if (!queued.id) {
    throw new Error(`BullMQ returned no job id for publication ${job.attemptId}`);
  }
  logger.debug('Publication enqueued', { attemptId: job.attemptId, jobId: queued.id });
  return queued.id;
  }

  async close(): Promise<void> {
  await this.queue.close();
  }
}
