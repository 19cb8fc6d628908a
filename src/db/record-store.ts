/**
 * Persistent title → body mapping for notes.
 *
 * Bodies are opaque to this layer; the access layer hands in cipher tokens.
 * Titles are unique and stored in the clear.
 */

import type Database from 'better-sqlite3';
import { DuplicateTitleError, NoteVaultError, StorageIOError, StoreClosedError, errorMessage } from '../errors';
import { openDb } from './connection';
import { migrate } from './migrations';

export interface RecordEntry {
  title: string;
  body: string;
}

export class RecordStore {
  private db: Database.Database | null;

  private constructor(
    db: Database.Database,
    readonly dbPath: string
  ) {
    this.db = db;
  }

  /**
   * Open (or create) the store and bring its schema up to date.
   *
   * @throws StorageIOError if the database cannot be opened or migrated
   */
  static open(dbPath: string): RecordStore {
    let db: Database.Database | undefined;
    try {
      db = openDb(dbPath);
      migrate(db);
      return new RecordStore(db, dbPath);
    } catch (err) {
      db?.close();
      throw new StorageIOError(`Failed to open record store at ${dbPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  get isClosed(): boolean {
    return this.db === null;
  }

  /**
   * Exact-match lookup.
   *
   * @returns The stored body, or undefined when no note has this title
   */
  get(title: string): string | undefined {
    return this.run('read record', (db) => {
      const row = db.prepare('SELECT body FROM records WHERE title = ?').get(title) as
        | { body: string }
        | undefined;
      return row?.body;
    });
  }

  /**
   * Insert a new note. Existing notes are never overwritten.
   *
   * @throws DuplicateTitleError when the title is taken
   */
  put(title: string, body: string): void {
    this.run('write record', (db) => {
      const result = db
        .prepare('INSERT INTO records (title, body) VALUES (?, ?) ON CONFLICT(title) DO NOTHING')
        .run(title, body);
      if (result.changes === 0) {
        throw new DuplicateTitleError(title);
      }
    });
  }

  /**
   * Remove a note. Removing a missing title is not an error.
   */
  delete(title: string): void {
    this.run('delete record', (db) => {
      db.prepare('DELETE FROM records WHERE title = ?').run(title);
    });
  }

  /** All titles, sorted. */
  titles(): string[] {
    return this.run('list records', (db) => {
      const rows = db.prepare('SELECT title FROM records ORDER BY title').all() as Array<{
        title: string;
      }>;
      return rows.map((row) => row.title);
    });
  }

  count(): number {
    return this.run('count records', (db) => {
      const row = db.prepare('SELECT COUNT(*) as count FROM records').get() as { count: number };
      return row.count;
    });
  }

  /**
   * Replace every body with `transform(entry)` in a single transaction.
   * If `transform` throws, nothing is changed; vault errors propagate as they
   * are, anything else as StorageIOError.
   *
   * @returns Number of rewritten notes
   */
  rewriteAll(transform: (entry: RecordEntry) => string): number {
    return this.run('rewrite records', (db) => {
      const select = db.prepare('SELECT title, body FROM records ORDER BY title');
      const update = db.prepare('UPDATE records SET body = ? WHERE title = ?');

      const rewrite = db.transaction(() => {
        const entries = select.all() as RecordEntry[];
        for (const entry of entries) {
          update.run(transform(entry), entry.title);
        }
        return entries.length;
      });
      return rewrite();
    });
  }

  /** Delete every note. */
  clear(): void {
    this.run('clear records', (db) => {
      db.exec('DELETE FROM records');
    });
  }

  /**
   * Release the connection. Idempotent; any other call afterwards throws
   * StoreClosedError.
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private run<T>(action: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new StoreClosedError();
    }
    try {
      return fn(this.db);
    } catch (err) {
      if (err instanceof NoteVaultError) throw err;
      throw new StorageIOError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
