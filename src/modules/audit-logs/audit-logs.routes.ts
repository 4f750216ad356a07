import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { createCrudHandlers } from '../shared/crud.controller';
import { auditLogQuerySchema } from './audit-logs.validation';

// Read-only: entries are written by the audit middleware
export const createAuditLogsRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createCrudHandlers(repositories.auditLogs, auditLogQuerySchema);

  router.use(authenticate, requireAdmin);

  router.get('/', controller.list);
  router.get('/:id', controller.get);

  return router;
};
