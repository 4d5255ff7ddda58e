import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 3,
  name: 'create_recipe_attributes',

  up(db: Database): void {
    // UNIQUE(user_id, name) backs the find-or-create used when recipes name tags inline
    db.exec(`
      CREATE TABLE tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        name TEXT NOT NULL,
        UNIQUE (user_id, name)
      );

      CREATE TABLE ingredients (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        name TEXT NOT NULL,
        UNIQUE (user_id, name)
      );
    `);
  },

  down(db: Database): void {
    db.exec(`
      DROP TABLE IF EXISTS ingredients;
      DROP TABLE IF EXISTS tags;
    `);
  },
};
