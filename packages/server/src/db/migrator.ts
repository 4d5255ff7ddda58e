import type { Database } from 'better-sqlite3';
import { info } from 'firebase-functions/logger';

export interface Migration {
  version: number;
  name: string;
  up(db: Database): void;
  down(db: Database): void;
}

export class Migrator {
  private db: Database;
  private migrations: Migration[];

  constructor(db: Database, migrations: Migration[]) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      )
    `);
  }

  appliedVersions(): number[] {
    this.ensureMigrationsTable();
    const rows = this.db
      .prepare('SELECT version FROM schema_migrations ORDER BY version')
      .pluck()
      .all();
    return rows.filter((version): version is number => typeof version === 'number');
  }

  /**
   * Apply every pending migration in version order.
   * Each migration runs in its own transaction.
   * Returns the number of migrations applied.
   */
  up(): number {
    const applied = new Set(this.appliedVersions());
    const pending = this.migrations.filter((migration) => !applied.has(migration.version));

    for (const migration of pending) {
      this.db.transaction(() => {
        migration.up(this.db);
        this.db
          .prepare('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)')
          .run(migration.version, migration.name, new Date().toISOString());
      })();
      info('Applied migration', { version: migration.version, name: migration.name });
    }

    return pending.length;
  }

  /**
   * Revert applied migrations newer than targetVersion, newest first.
   * Returns the number of migrations reverted.
   */
  down(targetVersion = 0): number {
    const applied = new Set(this.appliedVersions());
    const toRevert = this.migrations
      .filter((migration) => migration.version > targetVersion && applied.has(migration.version))
      .reverse();

    for (const migration of toRevert) {
      this.db.transaction(() => {
        migration.down(this.db);
        this.db.prepare('DELETE FROM schema_migrations WHERE version = ?').run(migration.version);
      })();
      info('Reverted migration', { version: migration.version, name: migration.name });
    }

    return toRevert.length;
  }
}
