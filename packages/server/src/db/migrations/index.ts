import type { Migration } from '../migrator.js';
import { migration as createUsers } from './001_create_users.js';
import { migration as createAuthTokens } from './002_create_auth_tokens.js';
import { migration as createRecipeAttributes } from './003_create_recipe_attributes.js';
import { migration as createRecipes } from './004_create_recipes.js';

export const migrations: Migration[] = [
  createUsers,
  createAuthTokens,
  createRecipeAttributes,
  createRecipes,
];
