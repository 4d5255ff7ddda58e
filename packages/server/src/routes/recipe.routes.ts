import { Router, type Request, type Response } from 'express';
import type { ApiResponse, RecipeDetail, RecipeImage, RecipeSummary } from '../types/index.js';
import {
  createRecipeSchema,
  idParamSchema,
  listRecipesQuerySchema,
  replaceRecipeSchema,
  updateRecipeSchema,
  type CreateRecipeInput,
  type ReplaceRecipeInput,
  type UpdateRecipeInput,
} from '../schemas/index.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { getAuthUser } from '../middleware/authenticate.js';
import { createImageUpload } from '../middleware/upload.js';
import type { RecipeService } from '../services/index.js';

type Params = Record<string, string>;

export interface RecipeRouterOptions {
  maxImageBytes: number;
}

/** Routes for /api/recipe/recipes. Expects `authenticate` to run first. */
export function createRecipeRouter(recipes: RecipeService, options: RecipeRouterOptions): Router {
  const router = Router();
  const upload = createImageUpload(options.maxImageBytes);

  // GET /api/recipe/recipes?tags=1,2&ingredients=3
  router.get('/', (req: Request, res: Response): void => {
    const user = getAuthUser(res);
    const filters = listRecipesQuerySchema.parse(req.query);
    const response: ApiResponse<RecipeSummary[]> = {
      success: true,
      data: recipes.list(user.id, filters),
    };
    res.json(response);
  });

  // GET /api/recipe/recipes/:id
  router.get('/:id', (req: Request, res: Response): void => {
    const user = getAuthUser(res);
    const { id } = idParamSchema.parse(req.params);
    const response: ApiResponse<RecipeDetail> = {
      success: true,
      data: recipes.get(user.id, id),
    };
    res.json(response);
  });

  // POST /api/recipe/recipes
  router.post(
    '/',
    validate(createRecipeSchema),
    (req: Request<Params, unknown, CreateRecipeInput>, res: Response): void => {
      const user = getAuthUser(res);
      const response: ApiResponse<RecipeDetail> = {
        success: true,
        data: recipes.create(user.id, req.body),
      };
      res.status(201).json(response);
    }
  );

  // PUT /api/recipe/recipes/:id
  router.put(
    '/:id',
    validate(replaceRecipeSchema),
    (req: Request<Params, unknown, ReplaceRecipeInput>, res: Response): void => {
      const user = getAuthUser(res);
      const { id } = idParamSchema.parse(req.params);
      const response: ApiResponse<RecipeDetail> = {
        success: true,
        data: recipes.replace(user.id, id, req.body),
      };
      res.json(response);
    }
  );

  // PATCH /api/recipe/recipes/:id
  router.patch(
    '/:id',
    validate(updateRecipeSchema),
    (req: Request<Params, unknown, UpdateRecipeInput>, res: Response): void => {
      const user = getAuthUser(res);
      const { id } = idParamSchema.parse(req.params);
      const response: ApiResponse<RecipeDetail> = {
        success: true,
        data: recipes.update(user.id, id, req.body),
      };
      res.json(response);
    }
  );

  // DELETE /api/recipe/recipes/:id
  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const user = getAuthUser(res);
      const { id } = idParamSchema.parse(req.params);
      await recipes.delete(user.id, id);
      const response: ApiResponse<{ deleted: true }> = {
        success: true,
        data: { deleted: true },
      };
      res.json(response);
    })
  );

  // POST /api/recipe/recipes/:id/upload-image (multipart, field "image")
  router.post(
    '/:id/upload-image',
    upload,
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const user = getAuthUser(res);
      const { id } = idParamSchema.parse(req.params);
      const response: ApiResponse<RecipeImage> = {
        success: true,
        data: await recipes.uploadImage(user.id, id, req.file?.buffer),
      };
      res.json(response);
    })
  );

  return router;
}
