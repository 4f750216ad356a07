import { z } from 'zod';
import type { CreateAdminInput, UpdateAdminInput } from '../../connections/db/models';
import { foreignKey, listQuerySchema } from '../../utils/validation';

const accessLevelSchema = z.enum(['staff', 'super']);

export const createAdminSchema: z.ZodType<CreateAdminInput> = z.object({
  user_id: foreignKey,
  access_level: accessLevelSchema.optional(),
});

export const updateAdminSchema: z.ZodType<UpdateAdminInput> = z.object({
  access_level: accessLevelSchema.optional(),
});

export const adminQuerySchema = listQuerySchema.extend({
  access_level: accessLevelSchema.optional(),
});
