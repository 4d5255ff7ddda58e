import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import multer from 'multer';
import { error as logError, warn } from 'firebase-functions/logger';
import type { ApiError } from '../types/api.js';
import { AppError, type FieldErrors } from '../types/errors.js';

export { AppError, NotFoundError, ValidationError, UnauthorizedError, ConflictError } from '../types/errors.js';

/** Flatten zod issues into `{ field: [messages] }`, keyed by dotted path. */
export function toFieldErrors(err: ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of err.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors';
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/** The 4xx status body-parser and similar middleware attach to request errors, if any. */
function clientErrorStatus(err: Error): number | null {
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ApiError = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: toFieldErrors(err),
      },
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof multer.MulterError) {
    const response: ApiError = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: { image: [err.message] },
      },
    };
    res.status(400).json(response);
    return;
  }

  if (isBodyParseError(err)) {
    const response: ApiError = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
      },
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof AppError) {
    warn('Request failed', {
      method: req.method,
      path: req.originalUrl,
      status: err.statusCode,
      code: err.code,
    });
    const response: ApiError = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    };
    res.status(err.statusCode).json(response);
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    warn('Request rejected', {
      method: req.method,
      path: req.originalUrl,
      status: clientStatus,
      message: err.message,
    });
    const tooLarge = clientStatus === 413;
    const response: ApiError = {
      success: false,
      error: {
        code: tooLarge ? 'PAYLOAD_TOO_LARGE' : 'VALIDATION_ERROR',
        message: tooLarge ? 'Request body too large' : err.message,
      },
    };
    res.status(tooLarge ? 413 : 400).json(response);
    return;
  }

  logError('Unhandled error', {
    method: req.method,
    path: req.originalUrl,
    message: err.message,
    stack: err.stack,
  });
  const response: ApiError = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
  res.status(500).json(response);
}
