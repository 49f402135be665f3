import type { PoolClient } from 'pg';

import { isUniqueViolation, parseJSONBObject, serializeForJSONB, withTransaction, type DbPool } from '@database';
import { getLogger, toError } from '@kernel/logger';

import {
  ATTEMPT_STATUSES,
  PublicationAttempt,
  isAttemptStatus,
  type AttemptStatus,
} from '../../domain/entities/PublicationAttempt';
import { isNetwork, NETWORKS, type Network } from '../../domain/networks';
import {
  ActiveAttemptExistsError,
  type PublicationAttemptRepository,
} from '../../application/ports/PublicationAttemptRepository';

const logger = getLogger('publishing:attempt:repository');

/** Partial unique index on (content_item_id, network) for pending/processing rows */
export const ACTIVE_ATTEMPT_INDEX = 'publication_attempts_one_active_per_network';

function validateStatus(status: string): AttemptStatus {
  if (!isAttemptStatus(status)) {
  throw new Error(
    `Invalid publication status in database: '${status}'. ` +
    `Expected one of: ${ATTEMPT_STATUSES.join(', ')}`
  );
  }
  return status;
}

function validateNetwork(network: string): Network {
  if (!isNetwork(network)) {
  throw new Error(
    `Invalid network in database: '${network}'. ` +
    `Expected one of: ${NETWORKS.join(', ')}`
  );
  }
  return network;
}

// Database row type for PublicationAttempt
export type PublicationAttemptRow = {
  id: string;
  content_item_id: string;
  network: string;
  adapted_content: string | null;
  status: string;
  published_at: Date | null;
  error_message: string | null;
  metadata: unknown;
  retry_count: number;
  created_at: Date;
  updated_at: Date;
};

function mapRow(row: PublicationAttemptRow): PublicationAttempt {
  return PublicationAttempt.reconstitute({
  id: row.id,
  contentItemId: row.content_item_id,
  network: validateNetwork(row.network),
  adaptedContent: row.adapted_content,
  status: validateStatus(row.status),
  publishedAt: row.published_at ? new Date(row.published_at) : null,
  errorMessage: row.error_message,
  metadata: parseJSONBObject(row.metadata),
  retryCount: row.retry_count,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
  });
}

const COLUMNS = `id, content_item_id, network, adapted_content, status,
  published_at, error_message, metadata, retry_count, created_at, updated_at`;

/**
* Repository implementation for PublicationAttempt using PostgreSQL
*/
export class PostgresPublicationAttemptRepository implements PublicationAttemptRepository {
  constructor(private readonly pool: DbPool) {}

  private getQueryable(client?: PoolClient): DbPool | PoolClient {
  return client || this.pool;
  }

  async createMany(attempts: readonly PublicationAttempt[]): Promise<void> {
  if (attempts.length === 0) {
    return;
  }

  try {
    await withTransaction(this.pool, async (client) => {
    for (const attempt of attempts) {
      const state = attempt.toState();
      await client.query(
      `INSERT INTO publication_attempts (${COLUMNS})
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10, $11)`,
      [
        state.id,
        state.contentItemId,
        state.network,
        state.adaptedContent,
        state.status,
        state.publishedAt,
        state.errorMessage,
        serializeForJSONB(state.metadata),
        state.retryCount,
        state.createdAt,
        state.updatedAt,
      ]
      );
    }
    });
  } catch (error) {
    const first = attempts[0];
    if (first && isUniqueViolation(error, ACTIVE_ATTEMPT_INDEX)) {
    throw new ActiveAttemptExistsError(first.contentItemId, toError(error));
    }
    logger.error('Failed to create publication attempts', toError(error), {
    contentItemId: first?.contentItemId,
    count: attempts.length,
    });
    throw error;
  }
  }

  async getById(id: string, client?: PoolClient): Promise<PublicationAttempt | null> {
  try {
    const { rows } = await this.getQueryable(client).query<PublicationAttemptRow>(
    `SELECT ${COLUMNS} FROM publication_attempts WHERE id = $1`,
    [id]
    );
    const row = rows[0];
    return row ? mapRow(row) : null;
  } catch (error) {
    logger.error('Failed to get publication attempt by ID', toError(error), { id });
    throw error;
  }
  }

  async listByContentItem(contentItemId: string): Promise<PublicationAttempt[]> {
  try {
    const { rows } = await this.pool.query<PublicationAttemptRow>(
    `SELECT ${COLUMNS} FROM publication_attempts
    WHERE content_item_id = $1
    ORDER BY created_at ASC, id ASC`,
    [contentItemId]
    );
    return rows.map(mapRow);
  } catch (error) {
    logger.error('Failed to list publication attempts', toError(error), { contentItemId });
    throw error;
  }
  }

  /**
  * Single conditional UPDATE; the status check and the write cannot be
  * split by another writer.
  */
  async transitionStatus(next: PublicationAttempt, expected: AttemptStatus): Promise<boolean> {
  const state = next.toState();
  try {
    const result = await this.pool.query(
    `UPDATE publication_attempts SET
    status = $3,
    published_at = $4,
    error_message = $5,
    metadata = $6::jsonb,
    retry_count = $7,
    updated_at = $8
    WHERE id = $1 AND status = $2`,
    [
      state.id,
      expected,
      state.status,
      state.publishedAt,
      state.errorMessage,
      serializeForJSONB(state.metadata),
      state.retryCount,
      state.updatedAt,
    ]
    );
    return (result.rowCount ?? 0) === 1;
  } catch (error) {
    if (isUniqueViolation(error, ACTIVE_ATTEMPT_INDEX)) {
    throw new ActiveAttemptExistsError(state.contentItemId, toError(error));
    }
    logger.error('Failed to transition publication attempt', toError(error), {
    id: state.id,
    from: expected,
    to: state.status,
    });
    throw error;
  }
  }
}
