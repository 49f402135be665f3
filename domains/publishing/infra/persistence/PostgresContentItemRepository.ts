import type { PoolClient } from 'pg';

import { withTransaction, type DbPool } from '@database';
import { getLogger, toError } from '@kernel/logger';

import {
  CONTENT_STATUSES,
  ContentItem,
  isContentStatus,
  type ContentStatus,
} from '../../domain/entities/ContentItem';
import { isAttemptStatus, type AttemptStatus } from '../../domain/entities/PublicationAttempt';
import type {
  ContentItemRepository,
  ListContentItemsQuery,
} from '../../application/ports/ContentItemRepository';

const logger = getLogger('publishing:content:repository');

const MAX_LIMIT = 1000;

/**
* Validate status at runtime to prevent corrupted data from creating invalid entities
*/
function validateStatus(status: string): ContentStatus {
  if (!isContentStatus(status)) {
  throw new Error(
    `Invalid content status in database: '${status}'. ` +
    `Expected one of: ${CONTENT_STATUSES.join(', ')}`
  );
  }
  return status;
}

// Database row type for ContentItem
export type ContentItemRow = {
  id: string;
  title: string;
  body: string;
  status: string;
  created_at: Date;
  updated_at: Date;
};

function mapRow(row: ContentItemRow): ContentItem {
  return ContentItem.reconstitute({
  id: row.id,
  title: row.title,
  body: row.body,
  status: validateStatus(row.status),
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
  });
}

const COLUMNS = 'id, title, body, status, created_at, updated_at';

/**
* Repository implementation for ContentItem using PostgreSQL
*/
export class PostgresContentItemRepository implements ContentItemRepository {
  constructor(private readonly pool: DbPool) {}

  /**
  * Helper to get queryable (pool or client)
  */
  private getQueryable(client?: PoolClient): DbPool | PoolClient {
  return client || this.pool;
  }

  async getById(id: string, client?: PoolClient): Promise<ContentItem | null> {
  try {
    const { rows } = await this.getQueryable(client).query<ContentItemRow>(
    `SELECT ${COLUMNS} FROM content_items WHERE id = $1`,
    [id]
    );
    const row = rows[0];
    return row ? mapRow(row) : null;
  } catch (error) {
    logger.error('Failed to get content item by ID', toError(error), { id });
    throw error;
  }
  }

  async save(item: ContentItem, client?: PoolClient): Promise<void> {
  const state = item.toState();
  try {
    await this.getQueryable(client).query(
    `INSERT INTO content_items (${COLUMNS})
    VALUES ($1, $2, $3, $4, $5, $6)
    ON CONFLICT (id) DO UPDATE SET
    title = EXCLUDED.title,
    body = EXCLUDED.body,
    status = EXCLUDED.status,
    updated_at = EXCLUDED.updated_at`,
    [state.id, state.title, state.body, state.status, state.createdAt, state.updatedAt]
    );
  } catch (error) {
    logger.error('Failed to save content item', toError(error), { id: state.id });
    throw error;
  }
  }

  async list(query: ListContentItemsQuery): Promise<ContentItem[]> {
  const limit = Math.min(Math.max(1, query.limit), MAX_LIMIT);
  const offset = Math.max(0, query.offset);

  try {
    const { rows } = query.status
    ? await this.pool.query<ContentItemRow>(
      `SELECT ${COLUMNS} FROM content_items
      WHERE status = $1
      ORDER BY created_at DESC, id ASC
      LIMIT $2 OFFSET $3`,
      [query.status, limit, offset]
    )
    : await this.pool.query<ContentItemRow>(
      `SELECT ${COLUMNS} FROM content_items
      ORDER BY created_at DESC, id ASC
      LIMIT $1 OFFSET $2`,
      [limit, offset]
    );
    return rows.map(mapRow);
  } catch (error) {
    logger.error('Failed to list content items', toError(error), { status: query.status });
    throw error;
  }
  }

  /**
  * Attempts go with the item via ON DELETE CASCADE
  */
  async delete(id: string): Promise<boolean> {
  try {
    const result = await this.pool.query('DELETE FROM content_items WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  } catch (error) {
    logger.error('Failed to delete content item', toError(error), { id });
    throw error;
  }
  }

  /**
  * Lock the item row, read the committed attempt statuses and write the
  * reconciled status in one transaction. Concurrent refreshes for the same
  * item queue up on the row lock, so the last writer always sees every
  * attempt change committed before it.
  */
  async reconcileStatus(
  id: string,
  reconcile: (item: ContentItem, attemptStatuses: readonly AttemptStatus[]) => ContentItem
  ): Promise<ContentItem | null> {
  try {
    return await withTransaction(this.pool, async (client) => {
    const { rows } = await client.query<ContentItemRow>(
      `SELECT ${COLUMNS} FROM content_items WHERE id = $1 FOR UPDATE`,
      [id]
    );
    const row = rows[0];
    if (!row) {
      return null;
    }

    const { rows: statusRows } = await client.query<{ status: string }>(
      'SELECT status FROM publication_attempts WHERE content_item_id = $1',
      [id]
    );
    const statuses = statusRows.map(r => {
      if (!isAttemptStatus(r.status)) {
      throw new Error(`Invalid publication status in database: '${r.status}'`);
      }
      return r.status;
    });

    const current = mapRow(row);
    const next = reconcile(current, statuses);
    if (next !== current) {
      await client.query(
      'UPDATE content_items SET status = $2, updated_at = $3 WHERE id = $1',
      [id, next.status, next.updatedAt]
      );
    }
    return next;
    });
  } catch (error) {
    logger.error('Failed to reconcile content status', toError(error), { id });
    throw error;
  }
  }
}
