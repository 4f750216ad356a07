import { Response } from 'express';
import { logger } from './logging';

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code?: string;
    details?: unknown;
  };
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    },
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, { statusCode, error, meta });

    return res.status(statusCode).json(response);
  }

  static validationError(
    res: Response,
    errors: unknown,
    message: string = 'Invalid data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static unauthorized(
    res: Response,
    message: string = 'Unauthorized'
  ): Response {
    return this.error(res, message, 401, {
      code: 'UNAUTHORIZED',
    });
  }

  static forbidden(
    res: Response,
    message: string = 'Forbidden'
  ): Response {
    return this.error(res, message, 403, {
      code: 'FORBIDDEN',
    });
  }

  static notFound(
    res: Response,
    message: string = 'Not found',
    details?: unknown
  ): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
      details,
    });
  }

  static tooManyRequests(
    res: Response,
    message: string = 'Too many requests',
    retryAfter?: number
  ): Response {
    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  static internalError(
    res: Response,
    message: string = 'Internal server error',
    details?: unknown
  ): Response {
    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
      details,
    });
  }
}
