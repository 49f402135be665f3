import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Knex } from 'knex';

export const SQL_DIR = join(dirname(fileURLToPath(import.meta.url)), 'sql');

export interface SqlMigration {
  up: string;
  down: string;
}

/**
 * Read both halves of a migration. A missing .down.sql fails here, before
 * anything is applied.
 */
export function readSqlMigration(name: string, dir: string = SQL_DIR): SqlMigration {
  const downPath = join(dir, `${name}.down.sql`);
  if (!existsSync(downPath)) {
    throw new Error(`Migration rollback file missing: ${downPath}`);
  }
  return {
    up: readFileSync(join(dir, `${name}.up.sql`), 'utf8'),
    down: readFileSync(downPath, 'utf8'),
  };
}

/**
 * Knex MigrationSource over <name>.up.sql / <name>.down.sql pairs in
 * migrations/sql/, applied in name order, each in its own transaction.
 */
export class SqlMigrationSource implements Knex.MigrationSource<string> {
  constructor(private readonly dir: string = SQL_DIR) {}

  getMigrations(): Promise<string[]> {
    const names = readdirSync(this.dir)
      .filter(file => file.endsWith('.up.sql'))
      .map(file => file.slice(0, -'.up.sql'.length))
      .sort();
    return Promise.resolve(names);
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  getMigration(migration: string): Promise<Knex.Migration> {
    const sql = readSqlMigration(migration, this.dir);
    return Promise.resolve({
      up: async (knex: Knex) => {
        await knex.raw(sql.up);
      },
      down: async (knex: Knex) => {
        await knex.raw(sql.down);
      },
    });
  }
}
