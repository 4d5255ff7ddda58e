import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuthUser } from '../types/index.js';
import { UnauthorizedError } from '../types/errors.js';
import type { UserService } from '../services/user.service.js';

declare global {
  namespace Express {
    interface Locals {
      authUser?: AuthUser;
    }
  }
}

const AUTH_SCHEMES = new Set(['token', 'bearer']);

/** Extract the key from `Authorization: Token <key>` or `Bearer <key>`. */
export function parseAuthorizationHeader(header: string | undefined): string | null {
  if (header === undefined) {
    return null;
  }
  const [scheme, key, ...rest] = header.trim().split(/\s+/);
  if (scheme === undefined || key === undefined || rest.length > 0) {
    return null;
  }
  return AUTH_SCHEMES.has(scheme.toLowerCase()) ? key : null;
}

export function createAuthenticate(users: UserService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const key = parseAuthorizationHeader(req.get('authorization'));
    if (key === null) {
      next(new UnauthorizedError());
      return;
    }

    const user = users.authenticate(key);
    if (!user) {
      next(new UnauthorizedError('Invalid token.'));
      return;
    }

    res.locals.authUser = user;
    next();
  };
}

/** The user set by `createAuthenticate`; throws when the route was not protected. */
export function getAuthUser(res: Response): AuthUser {
  const user = res.locals.authUser;
  if (!user) {
    throw new UnauthorizedError();
  }
  return user;
}
