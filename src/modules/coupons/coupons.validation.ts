import { z } from 'zod';
import type { CreateCouponInput, UpdateCouponInput } from '../../connections/db/models';
import { booleanQuery, listQuerySchema, money } from '../../utils/validation';

const discountTypeSchema = z.enum(['percentage', 'fixed']);

export const createCouponSchema: z.ZodType<CreateCouponInput> = z
  .object({
    code: z.string().trim().min(3, 'Code must be at least 3 characters').max(50),
    discount_type: discountTypeSchema,
    discount_value: money.positive('Discount must be greater than 0'),
    is_active: z.boolean().optional(),
    expires_at: z.coerce.date().nullable().optional(),
  })
  .refine(coupon => coupon.discount_type !== 'percentage' || coupon.discount_value <= 100, {
    message: 'Percentage discount cannot exceed 100',
    path: ['discount_value'],
  });

export const updateCouponSchema: z.ZodType<UpdateCouponInput> = z.object({
  discount_type: discountTypeSchema.optional(),
  discount_value: money.positive('Discount must be greater than 0').optional(),
  is_active: z.boolean().optional(),
  expires_at: z.coerce.date().nullable().optional(),
});

export const couponQuerySchema = listQuerySchema.extend({
  is_active: booleanQuery.optional(),
  discount_type: discountTypeSchema.optional(),
});
