import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 2,
  name: 'create_auth_tokens',

  up(db: Database): void {
    // One token per user
    db.exec(`
      CREATE TABLE auth_tokens (
        key TEXT PRIMARY KEY,
        user_id INTEGER NOT NULL UNIQUE REFERENCES users(id) ON DELETE CASCADE,
        created_at TEXT NOT NULL
      );
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS auth_tokens');
  },
};
