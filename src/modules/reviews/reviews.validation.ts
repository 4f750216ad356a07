import { z } from 'zod';
import type { CreateReviewInput, UpdateReviewInput } from '../../connections/db/models';
import { foreignKey, idSchema, listQuerySchema } from '../../utils/validation';

const ratingSchema = z.number().int().min(1, 'Rating must be between 1 and 5').max(5, 'Rating must be between 1 and 5');
const commentSchema = z.string().trim().max(2000).nullable();

export const createReviewSchema: z.ZodType<CreateReviewInput> = z.object({
  user_id: foreignKey,
  product_id: foreignKey,
  rating: ratingSchema,
  comment: commentSchema.optional(),
});

export const updateReviewSchema: z.ZodType<UpdateReviewInput> = z.object({
  rating: ratingSchema.optional(),
  comment: commentSchema.optional(),
});

export const reviewBodySchema = z.object({
  product_id: foreignKey,
  rating: ratingSchema,
  comment: commentSchema.optional(),
});

export const reviewQuerySchema = listQuerySchema.extend({
  product_id: idSchema.optional(),
  user_id: idSchema.optional(),
});
