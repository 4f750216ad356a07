import { z } from 'zod';
import type { CreateUserInput, UpdateUserInput } from '../../connections/db/models';
import { listQuerySchema, nonEmpty } from '../../utils/validation';

const roleSchema = z.enum(['customer', 'seller']);
const phoneSchema = z.string().regex(/^\+?\d{7,15}$/, 'Phone must be 7-15 digits');

export const createUserSchema: z.ZodType<CreateUserInput> = z.object({
  email: z.string().trim().email('Invalid email'),
  password: z.string().min(8, 'Password must be at least 8 characters').max(128),
  full_name: nonEmpty('Full name'),
  phone: phoneSchema.nullable().optional(),
  role: roleSchema.optional(),
});

export const updateUserSchema: z.ZodType<UpdateUserInput> = z.object({
  email: z.string().trim().email('Invalid email').optional(),
  password: z.string().min(8, 'Password must be at least 8 characters').max(128).optional(),
  full_name: nonEmpty('Full name').optional(),
  phone: phoneSchema.nullable().optional(),
  role: roleSchema.optional(),
});

// Self-service profile edits cannot change the role
export const updateProfileSchema = z.object({
  email: z.string().trim().email('Invalid email').optional(),
  password: z.string().min(8, 'Password must be at least 8 characters').max(128).optional(),
  full_name: nonEmpty('Full name').optional(),
  phone: phoneSchema.nullable().optional(),
}).strict();

export const userQuerySchema = listQuerySchema.extend({
  role: roleSchema.optional(),
  email: z.string().optional(),
});
