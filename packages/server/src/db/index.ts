import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { Migrator } from './migrator.js';
import { migrations } from './migrations/index.js';

export type { Migration } from './migrator.js';
export { Migrator } from './migrator.js';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Open a SQLite database, enable foreign keys and apply pending migrations.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY_DATABASE) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== IN_MEMORY_DATABASE) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  const migrator = new Migrator(db, migrations);
  migrator.up();

  return db;
}

/**
 * Run fn inside a transaction: everything it writes commits together or
 * rolls back when it throws. Nested calls become savepoints.
 */
export function runInTransaction<T>(db: Database.Database, fn: () => T): T {
  return db.transaction(fn)();
}

export function isUniqueConstraintError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}
