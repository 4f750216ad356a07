import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { createAddressesController } from './addresses.controller';

export const createAddressesRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createAddressesController(repositories.addresses);

  router.use(authenticate);

  router.get('/', controller.getAddresses);
  router.get('/:id', controller.getAddressById);
  router.post('/', controller.createAddress);
  router.put('/:id', controller.updateAddress);
  router.delete('/:id', controller.deleteAddress);

  return router;
};
