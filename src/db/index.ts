/**
 * Database module - SQLite persistence for notes.
 */

export { openDb, getDbPath } from './connection';
export { migrate, getCurrentVersion, migrations } from './migrations';
export type { Migration } from './migrations';
export { RecordStore } from './record-store';
export type { RecordEntry } from './record-store';
