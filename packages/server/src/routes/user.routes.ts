import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { ApiResponse, UserProfile } from '../types/index.js';
import {
  changePasswordSchema,
  createUserSchema,
  tokenRequestSchema,
  updateUserSchema,
  type ChangePasswordInput,
  type CreateUserInput,
  type TokenRequestInput,
  type UpdateUserInput,
} from '../schemas/index.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { getAuthUser } from '../middleware/authenticate.js';
import type { IssuedToken, UserService } from '../services/index.js';

type Params = Record<string, string>;

export function createUserRouter(users: UserService, authenticate: RequestHandler): Router {
  const router = Router();

  // POST /api/user/create
  router.post(
    '/create',
    validate(createUserSchema),
    asyncHandler(async (req: Request<Params, unknown, CreateUserInput>, res: Response): Promise<void> => {
      const profile = await users.register(req.body);
      const response: ApiResponse<UserProfile> = { success: true, data: profile };
      res.status(201).json(response);
    })
  );

  // POST /api/user/token
  router.post(
    '/token',
    validate(tokenRequestSchema),
    asyncHandler(async (req: Request<Params, unknown, TokenRequestInput>, res: Response): Promise<void> => {
      const token = await users.issueToken(req.body);
      const response: ApiResponse<IssuedToken> = { success: true, data: token };
      res.json(response);
    })
  );

  // GET /api/user/me
  router.get('/me', authenticate, (_req: Request, res: Response): void => {
    const user = getAuthUser(res);
    const response: ApiResponse<UserProfile> = {
      success: true,
      data: users.getProfile(user.id),
    };
    res.json(response);
  });

  // PATCH /api/user/me
  router.patch(
    '/me',
    authenticate,
    validate(updateUserSchema),
    asyncHandler(async (req: Request<Params, unknown, UpdateUserInput>, res: Response): Promise<void> => {
      const user = getAuthUser(res);
      const profile = await users.updateProfile(user.id, req.body);
      const response: ApiResponse<UserProfile> = { success: true, data: profile };
      res.json(response);
    })
  );

  // POST /api/user/me/password
  router.post(
    '/me/password',
    authenticate,
    validate(changePasswordSchema),
    asyncHandler(async (req: Request<Params, unknown, ChangePasswordInput>, res: Response): Promise<void> => {
      const user = getAuthUser(res);
      const token = await users.changePassword(user.id, req.body);
      const response: ApiResponse<IssuedToken> = { success: true, data: token };
      res.json(response);
    })
  );

  return router;
}
