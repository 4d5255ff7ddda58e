/**
 * Test data factories. Every helper writes through the real repositories
 * so rows satisfy the schema's constraints.
 */
import type { Database } from 'better-sqlite3';
import { IN_MEMORY_DATABASE, openDatabase } from '../../db/index.js';
import { createRepositories, type Repositories } from '../../repositories/index.js';
import type { CreateRecipeDTO, Recipe, User } from '../../types/index.js';

export const TEST_PASSWORD = 'test-password';

/** Smallest byte sequences that pass the image signature check. */
export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);
export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);

let emailCounter = 0;

export function uniqueEmail(prefix = 'user'): string {
  emailCounter++;
  return `${prefix}${emailCounter}@example.com`;
}

export interface TestDatabase {
  db: Database;
  repos: Repositories;
}

export function createTestDatabase(): TestDatabase {
  const db = openDatabase(IN_MEMORY_DATABASE);
  return { db, repos: createRepositories(db) };
}

/** Insert a user directly; the hash is a placeholder, not a bcrypt hash. */
export function insertUser(repos: Repositories, overrides: Partial<User> = {}): User {
  return repos.users.create({
    email: overrides.email ?? uniqueEmail(),
    password_hash: overrides.password_hash ?? 'test-hash',
    name: overrides.name ?? 'Test User',
    is_staff: overrides.is_staff,
    is_superuser: overrides.is_superuser,
  });
}

export function insertRecipe(
  repos: Repositories,
  userId: number,
  overrides: Partial<CreateRecipeDTO> = {}
): Recipe {
  return repos.recipes.create(userId, {
    title: 'Sample recipe',
    time_minutes: 22,
    price: '5.25',
    ...overrides,
  });
}
