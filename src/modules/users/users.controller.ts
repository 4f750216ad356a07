import type { UserRepository } from './users.repository';
import { updateProfileSchema, userQuerySchema } from './users.validation';
import { createCrudHandlers } from '../shared/crud.controller';
import { asyncHandler } from '../../utils/async-handler';
import { requireUser } from '../../utils/access';
import { ResponseHandler } from '../../utils/response';
import { parseWith } from '../../utils/validation';

export const createUsersController = (users: UserRepository) => ({
  ...createCrudHandlers(users, userQuerySchema),

  getProfile: asyncHandler(async (req, res) => {
    const user = await users.get(requireUser(req).id);
    ResponseHandler.success(res, user);
  }),

  updateProfile: asyncHandler(async (req, res) => {
    const caller = requireUser(req);
    const input = parseWith(updateProfileSchema, req.body, 'Invalid profile data');
    const user = await users.update(caller.id, input);
    ResponseHandler.success(res, user, 'Profile updated');
  }),

  // Cascades to the account's addresses, cart, wishlist, reviews and orders
  deleteProfile: asyncHandler(async (req, res) => {
    await users.delete(requireUser(req).id);
    ResponseHandler.success(res, null, 'Account deleted');
  }),
});
