import { z } from 'zod';
import type { CreateProductInput, UpdateProductInput } from '../../connections/db/models';
import { booleanQuery, foreignKey, idSchema, listQuerySchema, MAX_INT, money, nonEmpty } from '../../utils/validation';

const priceSchema = money.positive('Price must be greater than 0');

export const createProductSchema: z.ZodType<CreateProductInput> = z.object({
  category_id: foreignKey,
  seller_id: foreignKey.nullable().optional(),
  name: nonEmpty('Product name'),
  description: z.string().trim().max(5000).nullable().optional(),
  price: priceSchema,
  is_active: z.boolean().optional(),
});

export const updateProductSchema: z.ZodType<UpdateProductInput> = z.object({
  category_id: foreignKey.optional(),
  name: nonEmpty('Product name').optional(),
  description: z.string().trim().max(5000).nullable().optional(),
  price: priceSchema.optional(),
  is_active: z.boolean().optional(),
});

// POST /products also accepts the opening stock for the product's inventory record
export const productBodySchema = z.object({
  category_id: foreignKey,
  seller_id: foreignKey.nullable().optional(),
  name: nonEmpty('Product name'),
  description: z.string().trim().max(5000).nullable().optional(),
  price: priceSchema,
  is_active: z.boolean().optional(),
  stock_quantity: z.number().int().nonnegative().max(MAX_INT).optional(),
});

export const productQuerySchema = listQuerySchema.extend({
  category_id: idSchema.optional(),
  seller_id: idSchema.optional(),
  is_active: booleanQuery.optional(),
});
