import type { NextFunction, Request, Response } from 'express';
import { JsonWebTokenError } from 'jsonwebtoken';
import type { AuthService } from '../modules/auth/auth.service';
import { UnauthorizedError } from '../utils/errors';
import { ResponseHandler } from '../utils/response';

const extractToken = (req: Request): string | undefined => {
  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  return scheme === 'Bearer' && token ? token : undefined;
};

export const createAuthMiddleware = (auth: AuthService) => {
  const authenticate = async (req: Request, res: Response, next: NextFunction) => {
    const token = extractToken(req);
    if (!token) {
      return ResponseHandler.unauthorized(res, 'Token not provided');
    }

    try {
      req.user = await auth.resolveToken(token);
    } catch (error: unknown) {
      if (error instanceof UnauthorizedError) {
        return ResponseHandler.unauthorized(res, error.message);
      }
      if (error instanceof JsonWebTokenError) {
        return ResponseHandler.unauthorized(res, 'Invalid or expired token');
      }
      return next(error);
    }
    next();
  };

  return { authenticate };
};

export type AuthGuards = ReturnType<typeof createAuthMiddleware>;

export const requireAdmin = (req: Request, res: Response, next: NextFunction) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res, 'Not authenticated');
  }
  if (!req.user.is_admin) {
    return ResponseHandler.forbidden(res, 'Admin access required');
  }
  next();
};

/** Admins pass every role check. */
export const requireRole = (...roles: string[]) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!req.user.is_admin && !roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'Access denied');
    }

    next();
  };
};
