import type { Database } from 'better-sqlite3';
import { createRepositories } from '../repositories/index.js';
import { UserService } from './user.service.js';
import { RecipeService } from './recipe.service.js';
import { RecipeAttributeService } from './recipe-attribute.service.js';
import { ImageStorage } from './image-storage.service.js';

export { UserService, toProfile, type NewUser, type IssuedToken } from './user.service.js';
export { RecipeService } from './recipe.service.js';
export { RecipeAttributeService } from './recipe-attribute.service.js';
export { ImageStorage, detectImageType, type ImageType } from './image-storage.service.js';
export { AssociationReconciler, type ReconcileMode } from './association-reconciler.js';

export interface ServiceOptions {
  mediaRoot: string;
  mediaUrl: string;
  bcryptRounds: number;
}

export interface Services {
  users: UserService;
  recipes: RecipeService;
  tags: RecipeAttributeService;
  ingredients: RecipeAttributeService;
}

export function createServices(db: Database, options: ServiceOptions): Services {
  const repos = createRepositories(db);
  const images = new ImageStorage(options.mediaRoot);

  return {
    users: new UserService({
      db,
      users: repos.users,
      tokens: repos.tokens,
      bcryptRounds: options.bcryptRounds,
    }),
    recipes: new RecipeService({
      db,
      recipes: repos.recipes,
      tags: repos.tags,
      ingredients: repos.ingredients,
      images,
      mediaUrl: options.mediaUrl,
    }),
    tags: new RecipeAttributeService(repos.tags, 'Tag'),
    ingredients: new RecipeAttributeService(repos.ingredients, 'Ingredient'),
  };
}
