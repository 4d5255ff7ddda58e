import { Router, type Request, type Response } from 'express';
import type { ApiResponse, RecipeAttribute } from '../types/index.js';
import {
  idParamSchema,
  listRecipeAttributesQuerySchema,
  updateRecipeAttributeSchema,
  type UpdateRecipeAttributeInput,
} from '../schemas/index.js';
import { validate } from '../middleware/validate.js';
import { getAuthUser } from '../middleware/authenticate.js';
import type { RecipeAttributeService } from '../services/index.js';

type Params = Record<string, string>;

/** Shared router for /api/recipe/tags and /api/recipe/ingredients. */
export function createRecipeAttributeRouter(service: RecipeAttributeService): Router {
  const router = Router();

  // GET /?assigned_only=1
  router.get('/', (req: Request, res: Response): void => {
    const user = getAuthUser(res);
    const query = listRecipeAttributesQuerySchema.parse(req.query);
    const response: ApiResponse<RecipeAttribute[]> = {
      success: true,
      data: service.list(user.id, { assignedOnly: query.assigned_only }),
    };
    res.json(response);
  });

  // GET /:id
  router.get('/:id', (req: Request, res: Response): void => {
    const user = getAuthUser(res);
    const { id } = idParamSchema.parse(req.params);
    const response: ApiResponse<RecipeAttribute> = {
      success: true,
      data: service.get(user.id, id),
    };
    res.json(response);
  });

  // PATCH /:id and PUT /:id both take { name }
  const rename = (req: Request<Params, unknown, UpdateRecipeAttributeInput>, res: Response): void => {
    const user = getAuthUser(res);
    const { id } = idParamSchema.parse(req.params);
    const response: ApiResponse<RecipeAttribute> = {
      success: true,
      data: service.rename(user.id, id, req.body.name),
    };
    res.json(response);
  };
  router.patch('/:id', validate(updateRecipeAttributeSchema), rename);
  router.put('/:id', validate(updateRecipeAttributeSchema), rename);

  // DELETE /:id
  router.delete('/:id', (req: Request, res: Response): void => {
    const user = getAuthUser(res);
    const { id } = idParamSchema.parse(req.params);
    service.delete(user.id, id);
    const response: ApiResponse<{ deleted: true }> = {
      success: true,
      data: { deleted: true },
    };
    res.json(response);
  });

  return router;
}
