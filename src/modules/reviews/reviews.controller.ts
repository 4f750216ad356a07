import type { Request } from 'express';
import type { ReviewRepository } from './reviews.repository';
import { reviewBodySchema, reviewQuerySchema } from './reviews.validation';
import { createCrudHandlers } from '../shared/crud.controller';
import { asyncHandler } from '../../utils/async-handler';
import { assertOwnerOrAdmin, requireUser } from '../../utils/access';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

export const createReviewsController = (reviews: ReviewRepository) => {
  const crud = createCrudHandlers(reviews, reviewQuerySchema);

  const loadOwned = async (req: Request) => {
    const user = requireUser(req);
    const review = await reviews.get(parseId(req.params.id, 'review id'));
    assertOwnerOrAdmin(user, review.user_id, 'review');
    return review;
  };

  return {
    getReviews: crud.list,
    getReviewById: crud.get,

    createReview: asyncHandler(async (req, res) => {
      const user = requireUser(req);
      const input = parseWith(reviewBodySchema, req.body, 'Invalid review data');
      const review = await reviews.create({ ...input, user_id: user.id });
      ResponseHandler.created(res, review, 'Review created');
    }),

    updateReview: asyncHandler(async (req, res) => {
      const existing = await loadOwned(req);
      const review = await reviews.update(existing.id, req.body ?? {});
      ResponseHandler.success(res, review, 'Review updated');
    }),

    deleteReview: asyncHandler(async (req, res) => {
      const existing = await loadOwned(req);
      await reviews.delete(existing.id);
      ResponseHandler.success(res, null, 'Review deleted');
    }),
  };
};
