import { z } from 'zod';
import type { CreateWishlistInput, UpdateWishlistInput } from '../../connections/db/models';
import { foreignKey } from '../../utils/validation';

export const createWishlistSchema: z.ZodType<CreateWishlistInput> = z.object({
  user_id: foreignKey,
  product_id: foreignKey,
});

// Entries are added and removed, never edited
export const updateWishlistSchema: z.ZodType<UpdateWishlistInput> = z.record(z.never());

export const wishlistBodySchema = z.object({
  product_id: foreignKey,
});
