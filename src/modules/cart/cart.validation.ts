import { z } from 'zod';
import type {
  CreateCartInput,
  CreateCartItemInput,
  UpdateCartInput,
  UpdateCartItemInput,
} from '../../connections/db/models';
import { foreignKey, quantity } from '../../utils/validation';

const quantitySchema = quantity('Quantity must be greater than 0');

export const createCartSchema: z.ZodType<CreateCartInput> = z.object({
  user_id: foreignKey,
});

// Carts carry no editable attributes
export const updateCartSchema: z.ZodType<UpdateCartInput> = z.record(z.never());

export const createCartItemSchema: z.ZodType<CreateCartItemInput> = z.object({
  cart_id: foreignKey,
  product_id: foreignKey,
  quantity: quantitySchema.optional(),
});

export const updateCartItemSchema: z.ZodType<UpdateCartItemInput> = z.object({
  quantity: quantitySchema.optional(),
});

export const addCartItemBodySchema = z.object({
  product_id: foreignKey,
  quantity: quantitySchema.default(1),
});

export const updateCartItemBodySchema = z.object({
  quantity: quantitySchema,
});
