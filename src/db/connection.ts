/**
 * SQLite connection management.
 *
 * Opens the vault database with WAL journaling. The storage directory must
 * already exist; it is validated when the vault is opened.
 */

import Database from 'better-sqlite3';
import path from 'path';

const DB_FILE_NAME = 'db.sqlite';

/**
 * Path of the record database inside a storage directory.
 */
export function getDbPath(storageDir: string): string {
  return path.join(storageDir, DB_FILE_NAME);
}

/**
 * Open a database connection. Pass ':memory:' for a throwaway database.
 */
export function openDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  // WAL keeps the file consistent if the process dies mid-write
  db.pragma('journal_mode = WAL');

  return db;
}
