import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createCrudHandlers } from '../shared/crud.controller';
import { adminQuerySchema } from './admins.validation';

export const createAdminsRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createCrudHandlers(repositories.admins, adminQuerySchema);

  router.use(authenticate, requireAdmin, auditTrail(repositories.auditLogs, 'admin'));

  router.get('/', controller.list);
  router.get('/:id', controller.get);
  router.post('/', controller.create);
  router.put('/:id', controller.update);
  router.delete('/:id', controller.remove);

  return router;
};
