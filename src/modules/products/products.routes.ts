import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireRole } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createProductsController } from './products.controller';

export const createProductsRoutes = ({ db, repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createProductsController(db, repositories);
  const sellerOnly = [authenticate, requireRole('seller'), auditTrail(repositories.auditLogs, 'product')];

  // Public routes
  router.get('/', controller.getProducts);
  router.get('/:id', controller.getProductById);
  router.get('/:id/inventory', controller.getProductInventory);
  router.get('/:id/reviews', controller.getProductReviews);

  // Seller/Admin routes
  router.post('/', ...sellerOnly, controller.createProduct);
  router.put('/:id', ...sellerOnly, controller.updateProduct);
  router.delete('/:id', ...sellerOnly, controller.deleteProduct);

  return router;
};
