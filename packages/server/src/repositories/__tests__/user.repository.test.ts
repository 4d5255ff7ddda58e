import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDatabase, insertUser, type TestDatabase } from '../../__tests__/utils/index.js';

describe('UserRepository', () => {
  let ctx: TestDatabase;

  beforeEach(() => {
    ctx = createTestDatabase();
  });

  afterEach(() => {
    ctx.db.close();
  });

  it('should create an active, non-staff user by default', () => {
    const user = ctx.repos.users.create({
      email: 'cook@example.com',
      password_hash: 'test-hash',
      name: 'Cook',
    });

    expect(user.id).toBeGreaterThan(0);
    expect(user.is_active).toBe(true);
    expect(user.is_staff).toBe(false);
    expect(user.is_superuser).toBe(false);
    expect(ctx.repos.users.findById(user.id)).toEqual(user);
  });

  it('should persist staff flags', () => {
    const user = insertUser(ctx.repos, { is_staff: true, is_superuser: true });

    const stored = ctx.repos.users.findById(user.id);
    expect(stored?.is_staff).toBe(true);
    expect(stored?.is_superuser).toBe(true);
  });

  it('should find users by exact email', () => {
    const user = insertUser(ctx.repos, { email: 'Chef@example.com' });

    expect(ctx.repos.users.findByEmail('Chef@example.com')?.id).toBe(user.id);
    expect(ctx.repos.users.findByEmail('chef@example.com')).toBeNull();
  });

  it('should reject a duplicate email', () => {
    insertUser(ctx.repos, { email: 'dup@example.com' });

    expect(() => insertUser(ctx.repos, { email: 'dup@example.com' })).toThrow();
  });

  it('should update only the provided fields', () => {
    const user = insertUser(ctx.repos, { name: 'Before' });

    const updated = ctx.repos.users.update(user.id, { name: 'After' });

    expect(updated?.name).toBe('After');
    expect(updated?.email).toBe(user.email);
    expect(updated?.password_hash).toBe(user.password_hash);
  });

  it('should return null when updating a missing user', () => {
    expect(ctx.repos.users.update(999, { name: 'Nobody' })).toBeNull();
  });
});
