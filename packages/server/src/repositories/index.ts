import type { Database } from 'better-sqlite3';
import { UserRepository } from './user.repository.js';
import { AuthTokenRepository } from './auth-token.repository.js';
import { RecipeRepository } from './recipe.repository.js';
import { TagRepository, IngredientRepository } from './recipe-attribute.repository.js';

export { BaseRepository, OwnedRepository } from './base.repository.js';
export { UserRepository } from './user.repository.js';
export { AuthTokenRepository } from './auth-token.repository.js';
export { RecipeRepository } from './recipe.repository.js';
export {
  RecipeAttributeRepository,
  TagRepository,
  IngredientRepository,
  type FindAttributesOptions,
} from './recipe-attribute.repository.js';

export interface Repositories {
  users: UserRepository;
  tokens: AuthTokenRepository;
  recipes: RecipeRepository;
  tags: TagRepository;
  ingredients: IngredientRepository;
}

export function createRepositories(db: Database): Repositories {
  return {
    users: new UserRepository(db),
    tokens: new AuthTokenRepository(db),
    recipes: new RecipeRepository(db),
    tags: new TagRepository(db),
    ingredients: new IngredientRepository(db),
  };
}
