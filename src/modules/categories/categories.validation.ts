import { z } from 'zod';
import type { CreateCategoryInput, UpdateCategoryInput } from '../../connections/db/models';
import { listQuerySchema, nonEmpty } from '../../utils/validation';

export const createCategorySchema: z.ZodType<CreateCategoryInput> = z.object({
  name: nonEmpty('Category name'),
  description: z.string().trim().max(2000).nullable().optional(),
});

export const updateCategorySchema: z.ZodType<UpdateCategoryInput> = z.object({
  name: nonEmpty('Category name').optional(),
  description: z.string().trim().max(2000).nullable().optional(),
});

export const categoryQuerySchema = listQuerySchema.extend({
  name: z.string().optional(),
});
