import type { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Forward a rejected handler promise to `next` so the error handler sees it. */
export function asyncHandler(fn: AsyncRouteHandler): RequestHandler {
  return (req, res, next): void => {
    fn(req, res, next).catch(next);
  };
}
