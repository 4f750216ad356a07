import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createInventoryController } from './inventory.controller';

export const createInventoryRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createInventoryController(repositories.inventory);

  router.use(authenticate, requireAdmin, auditTrail(repositories.auditLogs, 'inventory'));

  router.get('/', controller.list);
  router.get('/:id', controller.get);
  router.post('/', controller.create);
  router.put('/:id', controller.update);
  router.post('/:id/adjust', controller.adjustStock);
  router.delete('/:id', controller.remove);

  return router;
};
