import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createUsersController } from './users.controller';

export const createUsersRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createUsersController(repositories.users);

  router.use(authenticate);

  // Own account
  router.get('/me', controller.getProfile);
  router.put('/me', controller.updateProfile);
  router.delete('/me', controller.deleteProfile);

  // Account management
  router.use(requireAdmin, auditTrail(repositories.auditLogs, 'user'));
  router.get('/', controller.list);
  router.get('/:id', controller.get);
  router.post('/', controller.create);
  router.put('/:id', controller.update);
  router.delete('/:id', controller.remove);

  return router;
};
