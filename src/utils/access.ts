import type { Request } from 'express';
import type { AuthUser } from '../types/request.types';
import { ForbiddenError, UnauthorizedError } from './errors';

export const requireUser = (req: Request): AuthUser => {
  if (!req.user) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.user;
};

/** Owners and admins only. */
export const assertOwnerOrAdmin = (user: AuthUser, ownerId: number | null, entity: string): void => {
  if (!user.is_admin && user.id !== ownerId) {
    throw new ForbiddenError(`You do not have access to this ${entity}`);
  }
};
