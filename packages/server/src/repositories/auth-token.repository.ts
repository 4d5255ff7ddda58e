import { randomBytes } from 'node:crypto';
import type { Database } from 'better-sqlite3';
import type { AuthToken } from '../types/index.js';
import { isRecord, readNumber, readString } from './row-guards.js';

/** 40 hex characters. */
const TOKEN_BYTES = 20;

export class AuthTokenRepository {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  private parseEntity(row: unknown): AuthToken | null {
    if (!isRecord(row)) {
      return null;
    }
    const key = readString(row, 'key');
    const userId = readNumber(row, 'user_id');
    const createdAt = readString(row, 'created_at');
    if (key === null || userId === null || createdAt === null) {
      return null;
    }
    return { key, user_id: userId, created_at: createdAt };
  }

  findByKey(key: string): AuthToken | null {
    return this.parseEntity(this.db.prepare('SELECT * FROM auth_tokens WHERE key = ?').get(key));
  }

  findByUserId(userId: number): AuthToken | null {
    return this.parseEntity(this.db.prepare('SELECT * FROM auth_tokens WHERE user_id = ?').get(userId));
  }

  create(userId: number): AuthToken {
    const token: AuthToken = {
      key: randomBytes(TOKEN_BYTES).toString('hex'),
      user_id: userId,
      created_at: new Date().toISOString(),
    };
    this.db
      .prepare('INSERT INTO auth_tokens (key, user_id, created_at) VALUES (?, ?, ?)')
      .run(token.key, token.user_id, token.created_at);
    return token;
  }

  deleteForUser(userId: number): boolean {
    const result = this.db.prepare('DELETE FROM auth_tokens WHERE user_id = ?').run(userId);
    return result.changes > 0;
  }
}
