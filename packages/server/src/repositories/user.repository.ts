import type { Database } from 'better-sqlite3';
import type { User, CreateUserDTO, UpdateUserDTO } from '../types/index.js';
import { BaseRepository } from './base.repository.js';
import { readFlag, readNumber, readString } from './row-guards.js';

export class UserRepository extends BaseRepository<User> {
  constructor(db: Database) {
    super(db, 'users');
  }

  protected parseEntity(row: Record<string, unknown>): User | null {
    const id = readNumber(row, 'id');
    const email = readString(row, 'email');
    const name = readString(row, 'name');
    const passwordHash = readString(row, 'password_hash');
    const isActive = readFlag(row, 'is_active');
    const isStaff = readFlag(row, 'is_staff');
    const isSuperuser = readFlag(row, 'is_superuser');
    const createdAt = readString(row, 'created_at');
    const updatedAt = readString(row, 'updated_at');

    if (
      id === null ||
      email === null ||
      name === null ||
      passwordHash === null ||
      isActive === null ||
      isStaff === null ||
      isSuperuser === null ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    return {
      id,
      email,
      name,
      password_hash: passwordHash,
      is_active: isActive,
      is_staff: isStaff,
      is_superuser: isSuperuser,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }

  create(data: CreateUserDTO): User {
    const timestamps = this.createTimestamps();
    const isStaff = data.is_staff ?? false;
    const isSuperuser = data.is_superuser ?? false;

    const result = this.db
      .prepare(
        `INSERT INTO users (email, password_hash, name, is_active, is_staff, is_superuser, created_at, updated_at)
         VALUES (?, ?, ?, 1, ?, ?, ?, ?)`
      )
      .run(
        data.email,
        data.password_hash,
        data.name,
        isStaff ? 1 : 0,
        isSuperuser ? 1 : 0,
        timestamps.created_at,
        timestamps.updated_at
      );

    return {
      id: Number(result.lastInsertRowid),
      email: data.email,
      name: data.name,
      password_hash: data.password_hash,
      is_active: true,
      is_staff: isStaff,
      is_superuser: isSuperuser,
      ...timestamps,
    };
  }

  findByEmail(email: string): User | null {
    const row = this.db.prepare('SELECT * FROM users WHERE email = ?').get(email);
    return this.parseRow(row);
  }

  update(id: number, data: UpdateUserDTO): User | null {
    const existing = this.findById(id);
    if (!existing) {
      return null;
    }

    const { assignments, values } = this.buildUpdatePayload({
      email: data.email,
      name: data.name,
      password_hash: data.password_hash,
    });
    if (assignments.length === 0) {
      return existing;
    }

    this.db.prepare(`UPDATE users SET ${assignments.join(', ')} WHERE id = ?`).run(...values, id);
    return this.findById(id);
  }
}
