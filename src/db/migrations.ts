/**
 * Record store schema migrations.
 *
 * Applied versions are tracked in `schema_migrations`. Each migration runs in
 * its own transaction together with its bookkeeping row.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

/**
 * All migrations in order. Append new migrations to the end.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: 'records',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS records (
          title TEXT PRIMARY KEY,
          body TEXT NOT NULL
        );
      `);
    },
  },
  {
    // Early vaults keyed notes by a `name` column
    version: 2,
    name: 'rename_legacy_name_column',
    up: (db) => {
      const columns = db.prepare("SELECT name FROM pragma_table_info('records')").all() as Array<{
        name: string;
      }>;
      const names = columns.map((column) => column.name);
      if (names.includes('name') && !names.includes('title')) {
        db.exec('ALTER TABLE records RENAME COLUMN name TO title');
      }
    },
  },
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Highest applied migration, 0 for a fresh database.
 */
export function getCurrentVersion(db: Database.Database): number {
  ensureMigrationsTable(db);
  const row = db.prepare('SELECT MAX(version) as version FROM schema_migrations').get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

/**
 * Bring the schema up to date.
 *
 * @returns Names of the migrations applied, in order
 */
export function migrate(db: Database.Database, available: Migration[] = migrations): string[] {
  const currentVersion = getCurrentVersion(db);
  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)');

  const applied: string[] = [];
  for (const migration of available) {
    if (migration.version <= currentVersion) continue;
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
    applied.push(migration.name);
  }
  return applied;
}
