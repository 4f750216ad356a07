import express from 'express';
import type { AppContext } from '../context';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { createAuthRoutes } from '../modules/auth/auth.routes';
import { createUsersRoutes } from '../modules/users/users.routes';
import { createAdminsRoutes } from '../modules/admins/admins.routes';
import { createAddressesRoutes } from '../modules/addresses/addresses.routes';
import { createCategoriesRoutes } from '../modules/categories/categories.routes';
import { createProductsRoutes } from '../modules/products/products.routes';
import { createInventoryRoutes } from '../modules/inventory/inventory.routes';
import { createOrdersRoutes } from '../modules/orders/orders.routes';
import { createOrderItemsRoutes } from '../modules/orders/order-items.routes';
import { createPaymentsRoutes } from '../modules/payment/payment.routes';
import { createShippingRoutes } from '../modules/shipping/shipping.routes';
import { createCartRoutes } from '../modules/cart/cart.routes';
import { createReviewsRoutes } from '../modules/reviews/reviews.routes';
import { createCouponsRoutes } from '../modules/coupons/coupons.routes';
import { createWishlistRoutes } from '../modules/wishlist/wishlist.routes';
import { createAuditLogsRoutes } from '../modules/audit-logs/audit-logs.routes';

export const createRoutes = (context: AppContext) => {
  const router = express.Router();
  const guards = createAuthMiddleware(context.services.auth);

  // API Routes
  router.use('/auth', createAuthRoutes(context, guards));
  router.use('/users', createUsersRoutes(context, guards));
  router.use('/admins', createAdminsRoutes(context, guards));
  router.use('/addresses', createAddressesRoutes(context, guards));
  router.use('/categories', createCategoriesRoutes(context, guards));
  router.use('/products', createProductsRoutes(context, guards));
  router.use('/inventory', createInventoryRoutes(context, guards));
  router.use('/orders', createOrdersRoutes(context, guards));
  router.use('/order-items', createOrderItemsRoutes(context, guards));
  router.use('/payments', createPaymentsRoutes(context, guards));
  router.use('/shipping', createShippingRoutes(context, guards));
  router.use('/cart', createCartRoutes(context, guards));
  router.use('/reviews', createReviewsRoutes(context, guards));
  router.use('/coupons', createCouponsRoutes(context, guards));
  router.use('/wishlist', createWishlistRoutes(context, guards));
  router.use('/audit-logs', createAuditLogsRoutes(context, guards));

  return router;
};
