/**
 * Database Configuration
 */

import { parseIntEnv, requireEnv } from './env';

export const databaseConfig = {
  /** Maximum pooled connections per process */
  poolMax: parseIntEnv('DB_POOL_MAX', 10, { min: 1, max: 100 }),

  /** Per-statement timeout */
  statementTimeoutMs: parseIntEnv('DB_STATEMENT_TIMEOUT_MS', 30_000, { min: 1_000, max: 300_000 }),

  /** Fail fast if a connection cannot be acquired */
  connectionTimeoutMs: parseIntEnv('DB_CONNECTION_TIMEOUT_MS', 5_000, { min: 500, max: 60_000 }),
} as const;

Object.freeze(databaseConfig);

/**
 * Connection string, read lazily so modules can load without a database
 */
export function getDatabaseUrl(): string {
  return requireEnv('DATABASE_URL');
}
