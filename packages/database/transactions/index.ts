import type { PoolClient } from 'pg';

import { getLogger } from '@kernel/logger';

import type { DbPool } from '../pool';

const logger = getLogger('database:transactions');

const DEFAULT_STATEMENT_TIMEOUT_MS = 30_000;

/**
* Run fn inside BEGIN/COMMIT on a dedicated client, rolling back on any error.
* The client is always released.
*/
export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: PoolClient) => Promise<T>,
  statementTimeoutMs: number = DEFAULT_STATEMENT_TIMEOUT_MS
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN ISOLATION LEVEL READ COMMITTED');
    await client.query(`SET LOCAL statement_timeout = ${Math.trunc(statementTimeoutMs)}`);
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      const rollbackErr = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      logger.error('Rollback failed - transaction may be in inconsistent state', rollbackErr, {
        originalError: error instanceof Error ? error.message : String(error),
      });
    }
    throw error;
  } finally {
    client.release();
  }
}
