import { z } from 'zod';
import type { CreatePaymentInput, UpdatePaymentInput } from '../../connections/db/models';
import { foreignKey, idSchema, listQuerySchema, money } from '../../utils/validation';
import { PAYMENT_METHODS, PAYMENT_STATUSES } from '../../constants/order.constants';

const paymentStatusSchema = z.enum(PAYMENT_STATUSES);

export const createPaymentSchema: z.ZodType<CreatePaymentInput> = z.object({
  order_id: foreignKey,
  amount: money,
  method: z.enum(PAYMENT_METHODS),
  status: paymentStatusSchema.optional(),
});

// Amount and method are fixed once recorded
export const updatePaymentSchema: z.ZodType<UpdatePaymentInput> = z.object({
  status: paymentStatusSchema.optional(),
});

export const paymentQuerySchema = listQuerySchema.extend({
  order_id: idSchema.optional(),
  status: paymentStatusSchema.optional(),
});
