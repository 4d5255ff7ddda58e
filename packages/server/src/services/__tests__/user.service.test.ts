import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDatabase, type TestDatabase } from '../../__tests__/utils/index.js';
import { UserService } from '../user.service.js';
import { NotFoundError, ValidationError } from '../../types/errors.js';

function fieldErrors(fn: () => Promise<unknown>): Promise<unknown> {
  return fn().then(
    () => {
      throw new Error('expected a ValidationError');
    },
    (error: unknown) => {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      return error.details;
    }
  );
}

describe('UserService', () => {
  let ctx: TestDatabase;
  let service: UserService;

  beforeEach(() => {
    ctx = createTestDatabase();
    service = new UserService({
      db: ctx.db,
      users: ctx.repos.users,
      tokens: ctx.repos.tokens,
      bcryptRounds: 4,
    });
  });

  afterEach(() => {
    ctx.db.close();
  });

  describe('register', () => {
    it('should return the public profile', async () => {
      const profile = await service.register({
        email: 'cook@example.com',
        password: 'test-password',
        name: 'Cook',
      });

      expect(profile).toEqual({ id: profile.id, email: 'cook@example.com', name: 'Cook' });
    });

    it('should store a hash rather than the password', async () => {
      const profile = await service.register({
        email: 'cook@example.com',
        password: 'test-password',
        name: 'Cook',
      });

      const stored = ctx.repos.users.findById(profile.id);
      expect(stored?.password_hash).not.toBe('test-password');
      expect(stored?.password_hash.startsWith('$2')).toBe(true);
    });

    it('should lower-case only the email domain', async () => {
      const profile = await service.register({
        email: 'Mixed.Case@EXAMPLE.COM',
        password: 'test-password',
        name: 'Cook',
      });

      expect(profile.email).toBe('Mixed.Case@example.com');
    });

    it('should reject a duplicate email', async () => {
      await service.register({ email: 'cook@example.com', password: 'test-password', name: 'Cook' });

      const details = await fieldErrors(() =>
        service.register({ email: 'cook@EXAMPLE.com', password: 'test-password', name: 'Other' })
      );

      expect(details).toEqual({ email: ['user with this email already exists.'] });
    });

    it('should require an email', async () => {
      const details = await fieldErrors(() =>
        service.createUser({ email: '   ', password: 'test-password' })
      );

      expect(details).toEqual({ email: ['Users must have an email address.'] });
    });
  });

  describe('createSuperuser', () => {
    it('should set the staff and superuser flags', async () => {
      const user = await service.createSuperuser({ email: 'admin@example.com', password: 'test-password' });

      expect(user.is_staff).toBe(true);
      expect(user.is_superuser).toBe(true);
      expect(user.name).toBe('');
    });
  });

  describe('issueToken', () => {
    beforeEach(async () => {
      await service.register({ email: 'cook@example.com', password: 'test-password', name: 'Cook' });
    });

    it('should return the same token on every login', async () => {
      const first = await service.issueToken({ email: 'cook@example.com', password: 'test-password' });
      const second = await service.issueToken({ email: 'cook@example.com', password: 'test-password' });

      expect(first.token).toMatch(/^[0-9a-f]{40}$/);
      expect(second).toEqual(first);
    });

    it('should reject a wrong password', async () => {
      const details = await fieldErrors(() =>
        service.issueToken({ email: 'cook@example.com', password: 'wrong-password' })
      );

      expect(details).toEqual({ non_field_errors: ['Unable to authenticate with provided credentials.'] });
    });

    it('should reject an unknown email', async () => {
      const details = await fieldErrors(() =>
        service.issueToken({ email: 'nobody@example.com', password: 'test-password' })
      );

      expect(details).toEqual({ non_field_errors: ['Unable to authenticate with provided credentials.'] });
    });

    it('should reject an inactive user', async () => {
      ctx.db.prepare('UPDATE users SET is_active = 0').run();

      await expect(
        service.issueToken({ email: 'cook@example.com', password: 'test-password' })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('authenticate', () => {
    it('should resolve a token to its user without the hash', async () => {
      const profile = await service.register({
        email: 'cook@example.com',
        password: 'test-password',
        name: 'Cook',
      });
      const { token } = await service.issueToken({ email: 'cook@example.com', password: 'test-password' });

      const user = service.authenticate(token);

      expect(user?.id).toBe(profile.id);
      expect(user).not.toHaveProperty('password_hash');
    });

    it('should return null for an unknown token', () => {
      expect(service.authenticate('test-token')).toBeNull();
    });

    it('should return null for an inactive user', async () => {
      await service.register({ email: 'cook@example.com', password: 'test-password', name: 'Cook' });
      const { token } = await service.issueToken({ email: 'cook@example.com', password: 'test-password' });
      ctx.db.prepare('UPDATE users SET is_active = 0').run();

      expect(service.authenticate(token)).toBeNull();
    });
  });

  describe('updateProfile', () => {
    it('should update name and password', async () => {
      const profile = await service.register({
        email: 'cook@example.com',
        password: 'test-password',
        name: 'Cook',
      });

      const updated = await service.updateProfile(profile.id, { name: 'Chef', password: 'new-password' });

      expect(updated).toEqual({ id: profile.id, email: 'cook@example.com', name: 'Chef' });
      await expect(
        service.issueToken({ email: 'cook@example.com', password: 'new-password' })
      ).resolves.toHaveProperty('token');
    });

    it('should reject an email taken by another user', async () => {
      await service.register({ email: 'taken@example.com', password: 'test-password', name: 'A' });
      const profile = await service.register({ email: 'cook@example.com', password: 'test-password', name: 'B' });

      const details = await fieldErrors(() =>
        service.updateProfile(profile.id, { email: 'taken@example.com' })
      );

      expect(details).toEqual({ email: ['user with this email already exists.'] });
    });

    it('should report a missing user', async () => {
      await expect(service.updateProfile(999, { name: 'Ghost' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('changePassword', () => {
    it('should rotate the token', async () => {
      const profile = await service.register({
        email: 'cook@example.com',
        password: 'test-password',
        name: 'Cook',
      });
      const { token: oldToken } = await service.issueToken({
        email: 'cook@example.com',
        password: 'test-password',
      });

      const { token } = await service.changePassword(profile.id, {
        old_password: 'test-password',
        new_password: 'new-password',
      });

      expect(token).not.toBe(oldToken);
      expect(service.authenticate(oldToken)).toBeNull();
      expect(service.authenticate(token)?.id).toBe(profile.id);
    });

    it('should reject a wrong old password', async () => {
      const profile = await service.register({
        email: 'cook@example.com',
        password: 'test-password',
        name: 'Cook',
      });

      const details = await fieldErrors(() =>
        service.changePassword(profile.id, { old_password: 'wrong', new_password: 'new-password' })
      );

      expect(details).toEqual({ old_password: ['Your old password was entered incorrectly.'] });
    });
  });
});
