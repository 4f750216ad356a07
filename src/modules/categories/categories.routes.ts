import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createCategoriesController } from './categories.controller';

export const createCategoriesRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createCategoriesController(repositories.categories, repositories.products);
  const adminOnly = [authenticate, requireAdmin, auditTrail(repositories.auditLogs, 'category')];

  // Public routes
  router.get('/', controller.list);
  router.get('/:id', controller.get);
  router.get('/:id/products', controller.getCategoryProducts);

  // Admin routes
  router.post('/', ...adminOnly, controller.create);
  router.put('/:id', ...adminOnly, controller.update);
  router.delete('/:id', ...adminOnly, controller.remove);

  return router;
};
