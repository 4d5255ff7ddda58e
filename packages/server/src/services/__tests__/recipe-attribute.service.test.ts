import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createTestDatabase,
  insertRecipe,
  insertUser,
  type TestDatabase,
} from '../../__tests__/utils/index.js';
import { RecipeAttributeService } from '../recipe-attribute.service.js';
import { ConflictError, NotFoundError } from '../../types/errors.js';
import type { User } from '../../types/index.js';

describe('RecipeAttributeService', () => {
  let ctx: TestDatabase;
  let owner: User;
  let other: User;
  let service: RecipeAttributeService;

  beforeEach(() => {
    ctx = createTestDatabase();
    owner = insertUser(ctx.repos);
    other = insertUser(ctx.repos);
    service = new RecipeAttributeService(ctx.repos.tags, 'Tag');
  });

  afterEach(() => {
    ctx.db.close();
  });

  it('should list only the requesting user entities', () => {
    ctx.repos.tags.getOrCreate(owner.id, 'Mine');
    ctx.repos.tags.getOrCreate(other.id, 'Theirs');

    expect(service.list(owner.id).map((tag) => tag.name)).toEqual(['Mine']);
  });

  it('should filter to assigned entities', () => {
    const used = ctx.repos.tags.getOrCreate(owner.id, 'Used');
    ctx.repos.tags.getOrCreate(owner.id, 'Unused');
    const recipe = insertRecipe(ctx.repos, owner.id);
    ctx.repos.tags.link(recipe.id, used.id);

    expect(service.list(owner.id, { assignedOnly: true })).toEqual([used]);
    expect(service.list(owner.id, { assignedOnly: false })).toHaveLength(2);
  });

  it('should report another user entity as not found', () => {
    const tag = ctx.repos.tags.getOrCreate(other.id, 'Theirs');

    expect(() => service.get(owner.id, tag.id)).toThrow(NotFoundError);
    expect(() => service.get(owner.id, tag.id)).toThrow(`Tag with id ${tag.id} not found`);
    expect(() => service.delete(owner.id, tag.id)).toThrow(NotFoundError);
    expect(() => service.rename(owner.id, tag.id, 'Taken')).toThrow(NotFoundError);
  });

  it('should rename an entity', () => {
    const tag = ctx.repos.tags.getOrCreate(owner.id, 'Dessert');

    expect(service.rename(owner.id, tag.id, 'Sweets')).toEqual({ ...tag, name: 'Sweets' });
  });

  it('should accept renaming to the current name', () => {
    const tag = ctx.repos.tags.getOrCreate(owner.id, 'Dessert');

    expect(service.rename(owner.id, tag.id, 'Dessert')).toEqual(tag);
  });

  it('should refuse a name the user already has', () => {
    ctx.repos.tags.getOrCreate(owner.id, 'Dinner');
    const tag = ctx.repos.tags.getOrCreate(owner.id, 'Supper');

    expect(() => service.rename(owner.id, tag.id, 'Dinner')).toThrow(ConflictError);
    expect(() => service.rename(owner.id, tag.id, 'Dinner')).toThrow('Tag "Dinner" already exists');
  });

  it('should allow a name another user already has', () => {
    ctx.repos.tags.getOrCreate(other.id, 'Dinner');
    const tag = ctx.repos.tags.getOrCreate(owner.id, 'Supper');

    expect(service.rename(owner.id, tag.id, 'Dinner').name).toBe('Dinner');
  });

  it('should delete an entity and its links', () => {
    const tag = ctx.repos.tags.getOrCreate(owner.id, 'Temporary');
    const recipe = insertRecipe(ctx.repos, owner.id);
    ctx.repos.tags.link(recipe.id, tag.id);

    service.delete(owner.id, tag.id);

    expect(ctx.repos.tags.findById(tag.id)).toBeNull();
    expect(ctx.repos.tags.findLinkedIds(recipe.id)).toEqual([]);
    expect(ctx.repos.recipes.findById(recipe.id)).not.toBeNull();
  });
});
