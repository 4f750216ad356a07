import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { requireAdmin } from '../../middlewares/auth.middleware';
import { auditTrail } from '../../middlewares/audit.middleware';
import { createCouponsController } from './coupons.controller';

export const createCouponsRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createCouponsController(repositories.coupons);

  // Admin routes
  router.use(authenticate, requireAdmin, auditTrail(repositories.auditLogs, 'coupon'));

  router.get('/', controller.list);
  router.get('/code/:code', controller.getCouponByCode);
  router.get('/:id', controller.get);
  router.post('/', controller.create);
  router.put('/:id', controller.update);
  router.delete('/:id', controller.remove);

  return router;
};
