import knex, { type Knex } from 'knex';
import { join } from 'node:path';
import { writeFileSync, mkdirSync } from 'node:fs';

import { SqlMigrationSource, SQL_DIR } from '../migrations/SqlMigrationSource';

/**
 * Database Migration CLI
 *
 * Commands:
 *   up | latest       Run all pending migrations
 *   down | rollback   Rollback last batch (--all for everything)
 *   status            Show applied vs pending migrations
 *   make <name>       Create a new migration (up + down SQL files)
 */

/**
 * Replace the user:password@ part of a connection string for log output
 */
function sanitizeConnectionString(connStr: string): string {
  try {
    const url = new URL(connStr);
    if (url.username || url.password) {
      url.username = '***';
      url.password = '***';
    }
    return url.toString();
  } catch {
    // Not a URL: redact everything between "://" and the first "@"
    return connStr.replace(/:\/\/[^@]*@/, '://***:***@');
  }
}

function createKnexInstance(): Knex {
  const connectionString = process.env['DATABASE_URL'];
  if (!connectionString) {
    console.error('Error: DATABASE_URL environment variable is required.');
    console.error('Set it to your PostgreSQL connection string.');
    process.exit(1);
  }

  const isProduction = process.env['NODE_ENV'] === 'production';

  if (isProduction) {
    const hasSSLParam = connectionString.includes('sslmode=') || connectionString.includes('ssl=');
    if (!hasSSLParam) {
      console.warn(
        'WARNING: Connecting to a production database. SSL is enforced via config, ' +
        'but the connection string does not contain an explicit sslmode parameter. ' +
        `Connection: ${sanitizeConnectionString(connectionString)}`
      );
    }
  }

  return knex({
    client: 'postgresql',
    connection: {
      connectionString,
      ...(isProduction
        ? { ssl: { rejectUnauthorized: process.env['DB_SSL_REJECT_UNAUTHORIZED'] !== 'false' } }
        : {}),
    },
    // min 0 lets the process exit once migrations finish
    pool: { min: 0, max: 5 },
    migrations: {
      tableName: 'schema_migrations',
      migrationSource: new SqlMigrationSource(),
    },
  });
}

const command = process.argv[2];

/**
 * knex types pending entries from custom sources as opaque objects
 */
function describePending(item: unknown): string {
  if (typeof item === 'object' && item !== null) {
    const name: unknown = Reflect.get(item, 'name') ?? Reflect.get(item, 'file');
    if (typeof name === 'string') return name;
  }
  return String(item);
}

async function runUp(db: Knex): Promise<void> {
  console.log('Running all pending migrations...');
  const [batch, log] = await db.migrate.latest();
  if (log.length === 0) {
    console.log('Already up to date.');
  } else {
    console.log(`Batch ${batch}: ${log.length} migration(s) applied:`);
    for (const name of log) {
      console.log(`  + ${name}`);
    }
  }
}

async function runRollback(db: Knex): Promise<void> {
  const all = process.argv.includes('--all');
  console.log(all ? 'Rolling back all migrations...' : 'Rolling back last batch...');
  const [batch, log] = await db.migrate.rollback(undefined, all);
  if (log.length === 0) {
    console.log('Nothing to rollback.');
  } else {
    console.log(`Batch ${batch}: ${log.length} migration(s) rolled back:`);
    for (const name of log) {
      console.log(`  - ${name}`);
    }
  }
}

async function runStatus(db: Knex): Promise<void> {
  const [completed, pending] = await db.migrate.list();
  console.log(`\nCompleted migrations (${completed.length}):`);
  for (const name of completed) {
    console.log(`  [x] ${name}`);
  }
  console.log(`\nPending migrations (${pending.length}):`);
  for (const item of pending) {
    const name = typeof item === 'string' ? item : describePending(item);
    console.log(`  [ ] ${name}`);
  }
  console.log('');
}

function runMake(): void {
  const name = process.argv[3];
  if (!name) {
    console.error('Usage: npm run migrate -- make <name>');
    console.error('Example: npm run migrate -- make add_tags_table');
    process.exit(1);
  }

  const timestamp = new Date()
    .toISOString()
    .replace(/[-:T]/g, '')
    .slice(0, 14);
  const safeName = name.replace(/[^a-z0-9_]/gi, '_').toLowerCase();
  const baseName = `${timestamp}_${safeName}`;

  mkdirSync(SQL_DIR, { recursive: true });

  const upFile = join(SQL_DIR, `${baseName}.up.sql`);
  const downFile = join(SQL_DIR, `${baseName}.down.sql`);
  const createdAt = new Date().toISOString();

  writeFileSync(
    upFile,
    `-- Migration: ${name}\n-- Created: ${createdAt}\n\n-- Add your migration SQL here\n`
  );
  writeFileSync(
    downFile,
    `-- Rollback: ${name}\n-- Created: ${createdAt}\n\n-- Add your rollback SQL here\n`
  );

  console.log('Created migration files:');
  console.log(`  UP:   ${upFile}`);
  console.log(`  DOWN: ${downFile}`);
}

function printHelp(): void {
  console.log(`
Database Migration Tool

Usage: tsx scripts/migrate.ts <command>

Commands:
  up, latest       Run all pending migrations
  down, rollback   Rollback the last batch (--all for everything)
  status           Show migration status (applied / pending)
  make <name>      Create a new migration (paired .up.sql + .down.sql)

Examples:
  npm run migrate -- up                    # Apply pending migrations
  npm run migrate -- down                  # Rollback last batch
  npm run migrate -- down --all            # Rollback everything
  npm run migrate -- status                # Show status
  npm run migrate -- make add_tags_table   # Create new migration
`);
}

async function withDb(run: (db: Knex) => Promise<void>): Promise<void> {
  const db = createKnexInstance();
  try {
    await run(db);
  } finally {
    await db.destroy();
  }
}

async function main(): Promise<void> {
  try {
    switch (command) {
      case 'up':
      case 'latest':
        await withDb(runUp);
        break;
      case 'down':
      case 'rollback':
        await withDb(runRollback);
        break;
      case 'status':
        await withDb(runStatus);
        break;
      case 'make':
        runMake();
        break;
      default:
        printHelp();
        if (command) process.exit(1);
        break;
    }
  } catch (error) {
    const rawMessage = error instanceof Error ? error.message : String(error);
    console.error('Migration failed:', sanitizeConnectionString(rawMessage));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  const rawMessage = error instanceof Error ? error.message : String(error);
  console.error('Unhandled migration error:', sanitizeConnectionString(rawMessage));
  process.exit(1);
});
