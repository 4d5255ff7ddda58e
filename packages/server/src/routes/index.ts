import { Router } from 'express';
import type { Services } from '../services/index.js';
import { createAuthenticate } from '../middleware/authenticate.js';
import { healthRouter } from './health.routes.js';
import { createUserRouter } from './user.routes.js';
import { createRecipeRouter } from './recipe.routes.js';
import { createRecipeAttributeRouter } from './recipe-attribute.routes.js';

export interface ApiRouterOptions {
  maxImageBytes: number;
}

export function createApiRouter(services: Services, options: ApiRouterOptions): Router {
  const apiRouter = Router();
  const authenticate = createAuthenticate(services.users);

  apiRouter.use('/health', healthRouter);
  apiRouter.use('/user', createUserRouter(services.users, authenticate));
  apiRouter.use(
    '/recipe/recipes',
    authenticate,
    createRecipeRouter(services.recipes, { maxImageBytes: options.maxImageBytes })
  );
  apiRouter.use('/recipe/tags', authenticate, createRecipeAttributeRouter(services.tags));
  apiRouter.use('/recipe/ingredients', authenticate, createRecipeAttributeRouter(services.ingredients));

  return apiRouter;
}
