import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodSchema } from 'zod';

/**
 * Parse `req.body` with the schema and replace it with the parsed value.
 * A ZodError is thrown synchronously; Express hands it to the error handler.
 */
export function validate<T>(schema: ZodSchema<T>): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    req.body = schema.parse(req.body);
    next();
  };
}
