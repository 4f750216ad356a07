import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { createReviewsController } from './reviews.controller';

export const createReviewsRoutes = ({ repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createReviewsController(repositories.reviews);

  // Public routes
  router.get('/', controller.getReviews);
  router.get('/:id', controller.getReviewById);

  // Protected routes
  router.post('/', authenticate, controller.createReview);
  router.put('/:id', authenticate, controller.updateReview);
  router.delete('/:id', authenticate, controller.deleteReview);

  return router;
};
