import { Pool } from 'pg';

import { getLogger } from '@kernel/logger';

const logger = getLogger('database:pool');

/**
* The part of a pg Pool the repositories and transactions use
*/
export type DbPool = Pick<Pool, 'query' | 'connect'>;

export interface PoolSettings {
  connectionString: string;
  max: number;
  statementTimeoutMs: number;
  connectionTimeoutMs: number;
}

/**
* Create the process-wide pg pool. Ownership stays with the process entry
* point, which must call pool.end() on shutdown.
*/
export function createPool(settings: PoolSettings): Pool {
  const pool = new Pool({
    connectionString: settings.connectionString,
    max: settings.max,
    statement_timeout: settings.statementTimeoutMs,
    idle_in_transaction_session_timeout: settings.statementTimeoutMs * 2,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: settings.connectionTimeoutMs,
    keepAlive: true,
  });

  // Idle client errors are emitted on the pool; without a listener they crash the process
  pool.on('error', (err) => {
    logger.error('Unexpected pool error', err);
  });

  return pool;
}

/**
* Verify connectivity once at startup
*/
export async function validatePool(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
    logger.info('Database pool validated successfully');
  } finally {
    client.release();
  }
}
