import multer from 'multer';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ValidationError } from '../types/errors.js';

export const IMAGE_FIELD = 'image';

/**
 * Single `image` part held in memory. Limit breaches arrive as MulterError;
 * malformed multipart bodies are reported on the `image` field.
 */
export function createImageUpload(maxBytes: number): RequestHandler {
  const parse = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
  }).single(IMAGE_FIELD);

  return (req: Request, res: Response, next: NextFunction): void => {
    parse(req, res, (err?: unknown) => {
      if (err instanceof Error && !(err instanceof multer.MulterError)) {
        next(ValidationError.forField(IMAGE_FIELD, err.message));
        return;
      }
      next(err);
    });
  };
}
