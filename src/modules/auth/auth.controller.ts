import type { AuthService } from './auth.service';
import type { UserRepository } from '../users/users.repository';
import { registerSchema, loginSchema } from './auth.validation';
import { asyncHandler } from '../../utils/async-handler';
import { requireUser } from '../../utils/access';
import { ResponseHandler } from '../../utils/response';
import { parseWith } from '../../utils/validation';

export const createAuthController = (auth: AuthService, users: UserRepository) => ({
  register: asyncHandler(async (req, res) => {
    const input = parseWith(registerSchema, req.body, 'Invalid registration data');
    const result = await auth.register(input);
    ResponseHandler.created(res, result, 'Registration successful');
  }),

  login: asyncHandler(async (req, res) => {
    const input = parseWith(loginSchema, req.body, 'Invalid login data');
    const result = await auth.login(input);
    ResponseHandler.success(res, result, 'Login successful');
  }),

  me: asyncHandler(async (req, res) => {
    const caller = requireUser(req);
    const user = await users.get(caller.id);
    ResponseHandler.success(res, {
      ...user,
      is_admin: caller.is_admin,
      admin_level: caller.admin_level,
    });
  }),
});
