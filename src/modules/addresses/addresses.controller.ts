import type { Request } from 'express';
import type { UserAddressRepository } from './addresses.repository';
import { addressBodySchema } from './addresses.validation';
import { asyncHandler } from '../../utils/async-handler';
import { assertOwnerOrAdmin, requireUser } from '../../utils/access';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

export const createAddressesController = (addresses: UserAddressRepository) => {
  const loadOwned = async (req: Request) => {
    const user = requireUser(req);
    const address = await addresses.get(parseId(req.params.id, 'address id'));
    assertOwnerOrAdmin(user, address.user_id, 'address');
    return address;
  };

  return {
    getAddresses: asyncHandler(async (req, res) => {
      const list = await addresses.listByUser(requireUser(req).id);
      ResponseHandler.success(res, list);
    }),

    getAddressById: asyncHandler(async (req, res) => {
      ResponseHandler.success(res, await loadOwned(req));
    }),

    createAddress: asyncHandler(async (req, res) => {
      const user = requireUser(req);
      const input = parseWith(addressBodySchema, req.body, 'Invalid address data');
      const address = await addresses.create({ ...input, user_id: user.id });
      ResponseHandler.created(res, address, 'Address created');
    }),

    updateAddress: asyncHandler(async (req, res) => {
      const existing = await loadOwned(req);
      const address = await addresses.update(existing.id, req.body ?? {});
      ResponseHandler.success(res, address, 'Address updated');
    }),

    deleteAddress: asyncHandler(async (req, res) => {
      const existing = await loadOwned(req);
      await addresses.delete(existing.id);
      ResponseHandler.success(res, null, 'Address deleted');
    }),
  };
};
