import { z } from 'zod';
import type { CreateInventoryInput, UpdateInventoryInput } from '../../connections/db/models';
import { foreignKey, idSchema, listQuerySchema, MAX_INT } from '../../utils/validation';

const stockSchema = z.number().int().nonnegative('Stock cannot be negative').max(MAX_INT);

export const createInventorySchema: z.ZodType<CreateInventoryInput> = z.object({
  product_id: foreignKey,
  stock_quantity: stockSchema.optional(),
});

export const updateInventorySchema: z.ZodType<UpdateInventoryInput> = z.object({
  stock_quantity: stockSchema.optional(),
});

export const adjustInventorySchema = z.object({
  delta: z.number().int().min(-MAX_INT).max(MAX_INT).refine(value => value !== 0, 'Delta must not be 0'),
});

export const inventoryQuerySchema = listQuerySchema.extend({
  product_id: idSchema.optional(),
});
