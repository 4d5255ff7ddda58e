export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number | string) {
    super(404, 'NOT_FOUND', `${resource} with id ${id} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: FieldErrors) {
    super(400, 'VALIDATION_ERROR', message, details);
  }

  /** Single-field validation failure, reported in the same shape as zod field errors. */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError('Invalid request data', { [field]: [message] });
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication credentials were not provided') {
    super(401, 'UNAUTHORIZED', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
  }
}
