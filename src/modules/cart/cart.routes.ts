import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { createCartController } from './cart.controller';

export const createCartRoutes = ({ repositories, services }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createCartController(services.cart, repositories.carts, repositories.cartItems);

  // All cart routes require authentication
  router.use(authenticate);

  router.get('/', controller.getCart);
  router.post('/items', controller.addToCart);
  router.put('/items/:id', controller.updateCartItem);
  router.delete('/items/:id', controller.removeCartItem);
  router.delete('/', controller.clearCart);

  return router;
};
