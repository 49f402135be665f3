import type { Pool } from 'pg';

import {
  databaseConfig,
  getDatabaseUrl,
  getNetworkCredentials,
  publishingConfig,
  requireEnv,
} from '@config';
import { createPool } from '@database';
import { ContentAdapter } from '@domain/publishing/application/ContentAdapter';
import { ContentService } from '@domain/publishing/application/ContentService';
import { ContentStatusProjector } from '@domain/publishing/application/ContentStatusProjector';
import { DispatchCoordinator } from '@domain/publishing/application/DispatchCoordinator';
import { ImageService } from '@domain/publishing/application/ImageService';
import { PublicationWorker, type PublicationWorkerOptions } from '@domain/publishing/application/PublicationWorker';
import type { PublisherRegistry } from '@domain/publishing/application/PublisherRegistry';
import { StatusAggregator } from '@domain/publishing/application/StatusAggregator';
import type { ContentGenerator } from '@domain/publishing/application/ports/ContentGenerator';
import type { ContentItemRepository } from '@domain/publishing/application/ports/ContentItemRepository';
import type { ImageGenerator } from '@domain/publishing/application/ports/ImageGenerator';
import type { PublicationAttemptRepository } from '@domain/publishing/application/ports/PublicationAttemptRepository';
import type { PublicationQueue } from '@domain/publishing/application/ports/PublicationQueue';
import { PostgresContentItemRepository } from '@domain/publishing/infra/persistence/PostgresContentItemRepository';
import { PostgresPublicationAttemptRepository } from '@domain/publishing/infra/persistence/PostgresPublicationAttemptRepository';
import { BullMqPublicationQueue } from '@domain/publishing/infra/queue/BullMqPublicationQueue';
import { createHealthCheck, type HealthCheck } from '@kernel/health-check';
import { getLogger } from '@kernel/logger';
import { parseRedisUrl, pingRedis, type RedisConnectionOptions } from '@kernel/queues/bullmq-queue';

import { createContentGenerator, createImageGenerator, createPublisherRegistry } from './adapters/AdapterFactory';

const logger = getLogger('container');

// ============================================================================
// Service Wiring
// ============================================================================

export interface PublishingPorts {
  items: ContentItemRepository;
  attempts: PublicationAttemptRepository;
  queue: PublicationQueue;
  registry: PublisherRegistry;
  generator: ContentGenerator;
  imageGenerator: ImageGenerator;
  worker: PublicationWorkerOptions;
}

export interface PublishingServices {
  contents: ContentService;
  adapter: ContentAdapter;
  dispatcher: DispatchCoordinator;
  aggregator: StatusAggregator;
  images: ImageService;
  worker: PublicationWorker;
}

/**
 * Wire the application services over a set of ports. Production passes the
 * Postgres/BullMQ implementations; tests pass in-memory ones.
 */
export function createPublishingServices(ports: PublishingPorts): PublishingServices {
  const { items, attempts, queue, registry, generator } = ports;
  const projector = new ContentStatusProjector(items);

  return {
    contents: new ContentService(items, attempts),
    adapter: new ContentAdapter(items, attempts, generator, projector),
    dispatcher: new DispatchCoordinator(items, attempts, queue, projector),
    aggregator: new StatusAggregator(items, attempts),
    images: new ImageService(items, attempts, ports.imageGenerator),
    worker: new PublicationWorker(attempts, registry, projector, ports.worker),
  };
}

// ============================================================================
// Process Container
// ============================================================================

export interface Container {
  services: PublishingServices;
  pool: Pool;
  redis: RedisConnectionOptions;
  healthChecks: HealthCheck[];
  /** Release queue and pool; idempotent */
  close(): Promise<void>;
}

/**
 * Build the infrastructure both entry points share. The caller owns the
 * returned container and must close() it on shutdown.
 */
export async function createContainer(): Promise<Container> {
  const redis = parseRedisUrl(requireEnv('REDIS_URL'));
  await pingRedis(redis);

  const pool = createPool({
    connectionString: getDatabaseUrl(),
    max: databaseConfig.poolMax,
    statementTimeoutMs: databaseConfig.statementTimeoutMs,
    connectionTimeoutMs: databaseConfig.connectionTimeoutMs,
  });

  const queue = new BullMqPublicationQueue(publishingConfig.queueName, redis);
  const registry = createPublisherRegistry(getNetworkCredentials(), publishingConfig.publishTimeoutMs);

  const services = createPublishingServices({
    items: new PostgresContentItemRepository(pool),
    attempts: new PostgresPublicationAttemptRepository(pool),
    queue,
    registry,
    generator: createContentGenerator(),
    imageGenerator: createImageGenerator(),
    worker: {
      maxRetries: publishingConfig.maxRetries,
      retryDelayMs: publishingConfig.retryDelayMs,
    },
  });

  logger.info('Container initialized', { networks: registry.networks() });

  let closed = false;
  return {
    services,
    pool,
    redis,
    healthChecks: [
      createHealthCheck('database', () => pool.query('SELECT 1')),
      createHealthCheck('redis', () => pingRedis(redis)),
    ],
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await queue.close();
      await pool.end();
    },
  };
}
