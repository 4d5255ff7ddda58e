import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDatabase, insertUser, type TestDatabase } from '../../__tests__/utils/index.js';

describe('AuthTokenRepository', () => {
  let ctx: TestDatabase;

  beforeEach(() => {
    ctx = createTestDatabase();
  });

  afterEach(() => {
    ctx.db.close();
  });

  it('should create a 40 character hex key', () => {
    const user = insertUser(ctx.repos);

    const token = ctx.repos.tokens.create(user.id);

    expect(token.key).toMatch(/^[0-9a-f]{40}$/);
    expect(ctx.repos.tokens.findByKey(token.key)).toEqual(token);
    expect(ctx.repos.tokens.findByUserId(user.id)).toEqual(token);
  });

  it('should allow a single token per user', () => {
    const user = insertUser(ctx.repos);
    ctx.repos.tokens.create(user.id);

    expect(() => ctx.repos.tokens.create(user.id)).toThrow();
  });

  it('should delete a user token', () => {
    const user = insertUser(ctx.repos);
    const token = ctx.repos.tokens.create(user.id);

    expect(ctx.repos.tokens.deleteForUser(user.id)).toBe(true);
    expect(ctx.repos.tokens.findByKey(token.key)).toBeNull();
    expect(ctx.repos.tokens.deleteForUser(user.id)).toBe(false);
  });
});
