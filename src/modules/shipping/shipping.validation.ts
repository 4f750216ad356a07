import { z } from 'zod';
import type { CreateShippingInput, UpdateShippingInput } from '../../connections/db/models';
import { foreignKey, idSchema, listQuerySchema, nonEmpty } from '../../utils/validation';
import { SHIPPING_STATUSES } from '../../constants/order.constants';

const shippingStatusSchema = z.enum(SHIPPING_STATUSES);

export const createShippingSchema: z.ZodType<CreateShippingInput> = z.object({
  order_id: foreignKey,
  address: nonEmpty('Shipping address', 1000),
  carrier: z.string().trim().max(50).nullable().optional(),
  tracking_number: z.string().trim().max(100).nullable().optional(),
  status: shippingStatusSchema.optional(),
});

export const updateShippingSchema: z.ZodType<UpdateShippingInput> = z.object({
  carrier: z.string().trim().max(50).nullable().optional(),
  tracking_number: z.string().trim().max(100).nullable().optional(),
  status: shippingStatusSchema.optional(),
});

export const shippingQuerySchema = listQuerySchema.extend({
  order_id: idSchema.optional(),
  status: shippingStatusSchema.optional(),
});
