import { ZodError } from 'zod';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'INTERNAL_ERROR';

/**
 * Base class for errors that carry their own HTTP status.
 * The error middleware turns these into the standard response envelope.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: ErrorCode, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/**
 * Missing or malformed required field, or a violated cardinality
 * (a second Payment for an Order, a second Inventory for a Product, ...).
 */
export class ValidationError extends AppError {
  constructor(message: string = 'Invalid data', details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }

  static fromZod(error: ZodError, message: string = 'Invalid data'): ValidationError {
    return new ValidationError(
      message,
      error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found', details?: unknown) {
    super(message, 404, 'NOT_FOUND', details);
  }

  static entity(entity: string, id: number | string): NotFoundError {
    return new NotFoundError(`${entity} ${id} not found`, { entity, id });
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
  }
}

/** Pulls the SQLSTATE out of a driver error, if there is one. */
export const getPgErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};
