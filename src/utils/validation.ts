import { z } from 'zod';
import { ValidationError } from './errors';

// Column limits: INTEGER and DECIMAL(10, 2)
export const MAX_INT = 2147483647;
export const MAX_MONEY = 99999999.99;

// Shared building blocks for module validation schemas
export const idSchema = z.coerce.number().int().positive().max(MAX_INT);
export const foreignKey = z.number().int().positive().max(MAX_INT);
export const money = z
  .number()
  .finite()
  .nonnegative()
  .multipleOf(0.01, 'Amount must have at most 2 decimal places')
  .max(MAX_MONEY, `Amount cannot exceed ${MAX_MONEY}`);
export const quantity = (message: string) => z.number().int().positive(message).max(MAX_INT);
export const nonEmpty = (label: string, max: number = 255) =>
  z.string().trim().min(1, `${label} is required`).max(max);

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  offset: z.coerce.number().int().min(0).max(MAX_INT).optional(),
});

export const booleanQuery = z.enum(['true', 'false']).transform(value => value === 'true');

/**
 * Validate a request fragment (query string, params) and fail with a ValidationError.
 */
export const parseWith = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, message?: string): T => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(result.error, message);
  }
  return result.data;
};

export const parseId = (value: unknown, label: string = 'id'): number => {
  const result = idSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, { [label]: value });
  }
  return result.data;
};
