import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createOrdersController } from './orders.controller';

export const createOrdersRoutes = ({ repositories, services }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createOrdersController(repositories, services);
  const adminOnly = [requireAdmin, auditTrail(repositories.auditLogs, 'order')];

  // All order routes require authentication
  router.use(authenticate);

  router.post('/checkout', controller.checkout);
  router.get('/', controller.getOrders);
  router.get('/:id', controller.getOrderById);
  router.get('/:id/items', controller.getOrderItems);
  router.get('/:id/payment', controller.getOrderPayment);
  router.get('/:id/shipping', controller.getOrderShipping);

  // Admin routes
  router.post('/', ...adminOnly, controller.createOrder);
  router.put('/:id', ...adminOnly, controller.updateOrder);
  router.delete('/:id', ...adminOnly, controller.deleteOrder);

  return router;
};
