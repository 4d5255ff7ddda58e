import type { Database } from 'better-sqlite3';
import { isRecord } from './row-guards.js';

export type SqlValue = string | number | null;

export abstract class BaseRepository<T extends { id: number }> {
  protected db: Database;
  protected tableName: string;
  protected includeTimestampOnUpdate = true;

  constructor(db: Database, tableName: string) {
    this.db = db;
    this.tableName = tableName;
  }

  protected abstract parseEntity(row: Record<string, unknown>): T | null;

  findById(id: number): T | null {
    const row = this.db.prepare(`SELECT * FROM ${this.tableName} WHERE id = ?`).get(id);
    return this.parseRow(row);
  }

  protected parseRow(row: unknown): T | null {
    if (!isRecord(row)) {
      return null;
    }
    return this.parseEntity(row);
  }

  protected parseRows(rows: unknown[]): T[] {
    return rows
      .map((row) => this.parseRow(row))
      .filter((entity): entity is T => entity !== null);
  }

  /**
   * Turn a partial DTO into SET assignments, skipping undefined fields.
   * Adds updated_at when anything changes and the table tracks it.
   */
  protected buildUpdatePayload(data: Record<string, SqlValue | undefined>): {
    assignments: string[];
    values: SqlValue[];
  } {
    const assignments: string[] = [];
    const values: SqlValue[] = [];
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined) {
        assignments.push(`${key} = ?`);
        values.push(value);
      }
    }

    if (assignments.length > 0 && this.includeTimestampOnUpdate) {
      assignments.push('updated_at = ?');
      values.push(this.updateTimestamp());
    }

    return { assignments, values };
  }

  protected updateTimestamp(): string {
    return new Date().toISOString();
  }

  protected createTimestamps(): { created_at: string; updated_at: string } {
    const now = new Date().toISOString();
    return { created_at: now, updated_at: now };
  }
}

/**
 * Repository for rows owned by a user. Every read and write takes the
 * owner's id, so a row belonging to someone else looks exactly like a
 * missing one.
 */
export abstract class OwnedRepository<T extends { id: number; user_id: number }> extends BaseRepository<T> {
  findByIdForUser(userId: number, id: number): T | null {
    const row = this.db
      .prepare(`SELECT * FROM ${this.tableName} WHERE id = ? AND user_id = ?`)
      .get(id, userId);
    return this.parseRow(row);
  }

  protected updateForUser(
    userId: number,
    id: number,
    data: Record<string, SqlValue | undefined>
  ): T | null {
    const existing = this.findByIdForUser(userId, id);
    if (!existing) {
      return null;
    }

    const { assignments, values } = this.buildUpdatePayload(data);
    if (assignments.length === 0) {
      return existing;
    }

    this.db
      .prepare(`UPDATE ${this.tableName} SET ${assignments.join(', ')} WHERE id = ? AND user_id = ?`)
      .run(...values, id, userId);
    return this.findByIdForUser(userId, id);
  }

  deleteForUser(userId: number, id: number): boolean {
    const result = this.db
      .prepare(`DELETE FROM ${this.tableName} WHERE id = ? AND user_id = ?`)
      .run(id, userId);
    return result.changes > 0;
  }
}
