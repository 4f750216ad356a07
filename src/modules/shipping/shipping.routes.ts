import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createCrudHandlers } from '../shared/crud.controller';
import { shippingQuerySchema } from './shipping.validation';

export const createShippingRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createCrudHandlers(repositories.shipping, shippingQuerySchema);

  router.use(authenticate, requireAdmin, auditTrail(repositories.auditLogs, 'shipping'));

  router.get('/', controller.list);
  router.get('/:id', controller.get);
  router.post('/', controller.create);
  router.put('/:id', controller.update);
  router.delete('/:id', controller.remove);

  return router;
};
