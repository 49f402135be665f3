import type { Job } from 'bullmq';

import { publishingConfig, validateEnv } from '@config';
import type { ProcessResult } from '@domain/publishing/application/PublicationWorker';
import type { PublicationJob } from '@domain/publishing/application/ports/PublicationQueue';
import { PublicationJobSchema } from '@domain/publishing/infra/queue/BullMqPublicationQueue';
import { getLogger, toError } from '@kernel/logger';
import { createWorker } from '@kernel/queues/bullmq-worker';

import { createContainer } from './container';

try {
  validateEnv();
} catch (error) {
  process.stderr.write(`[startup] Environment validation failed: ${error instanceof Error ? error.message : error}\n`);
  process.exit(1);
}

const logger = getLogger('worker');

async function main(): Promise<void> {
  const container = await createContainer();
  const { worker: publicationWorker } = container.services;

  const worker = createWorker<PublicationJob, ProcessResult>(
    publishingConfig.queueName,
    async (job: Job<PublicationJob>) => {
      const parsed = PublicationJobSchema.safeParse(job.data);
      if (!parsed.success) {
        // Retrying a malformed payload cannot succeed; drop it
        logger.error('Malformed publication job', undefined, { jobId: job.id, issues: parsed.error.issues });
        return { outcome: 'skipped', calls: 0 };
      }
      const result = await publicationWorker.process(parsed.data);
      logger.info('Publication job finished', { jobId: job.id, attemptId: parsed.data.attemptId, ...result });
      return result;
    },
    {
      connection: container.redis,
      concurrency: publishingConfig.workerConcurrency,
      lockDuration: publishingConfig.jobTimeoutMs,
    }
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down worker', { signal });
    try {
      // Lets in-flight jobs finish before the pool goes away
      await worker.close();
      await container.close();
      process.exit(0);
    } catch (error) {
      logger.error('Worker shutdown failed', toError(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  logger.info('Publication worker started', {
    queue: publishingConfig.queueName,
    concurrency: publishingConfig.workerConcurrency,
  });
}

main().catch((error: unknown) => {
  logger.fatal('Worker failed to start', toError(error));
  process.exit(1);
});
