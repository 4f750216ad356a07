import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { createWishlistController } from './wishlist.controller';

export const createWishlistRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createWishlistController(repositories.wishlist);

  router.use(authenticate);

  router.get('/', controller.getWishlist);
  router.post('/', controller.addToWishlist);
  router.delete('/:product_id', controller.removeFromWishlist);

  return router;
};
