import type { AdminAccessLevel, UserRole } from '../connections/db/models';

/**
 * The authenticated caller, attached by the authenticate middleware
 */
export interface AuthUser {
  id: number;
  email: string;
  role: UserRole;
  is_admin: boolean;
  admin_level: AdminAccessLevel | null;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}
