import type { NextFunction, Request, Response } from 'express';
import { JsonWebTokenError } from 'jsonwebtoken';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AppError, ValidationError, getPgErrorCode } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, ValidationError.fromZod(err).details);
  }

  // TokenExpiredError extends JsonWebTokenError
  if (err instanceof JsonWebTokenError) {
    return ResponseHandler.unauthorized(res, 'Invalid or expired token');
  }

  // express.json() rejects malformed bodies with a 400 SyntaxError
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return ResponseHandler.validationError(res, undefined, 'Malformed JSON body');
  }

  // Database constraint errors that slipped past the repository checks
  const pgCode = getPgErrorCode(err);
  if (pgCode === '23505') {
    return ResponseHandler.error(res, 'Duplicate value violates a unique constraint', 400, {
      code: 'VALIDATION_ERROR',
    });
  }
  if (pgCode === '23503') {
    return ResponseHandler.error(res, 'Referenced record does not exist', 404, {
      code: 'NOT_FOUND',
    });
  }
  // numeric_value_out_of_range, invalid_text_representation
  if (pgCode === '22003' || pgCode === '22P02') {
    return ResponseHandler.error(res, 'Value does not fit its column', 400, {
      code: 'VALIDATION_ERROR',
    });
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  return ResponseHandler.internalError(
    res,
    'Internal server error',
    appConfig.nodeEnv === 'development' ? error.stack : undefined
  );
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
