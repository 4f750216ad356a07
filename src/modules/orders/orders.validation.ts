import { z } from 'zod';
import type {
  CreateOrderInput,
  CreateOrderItemInput,
  UpdateOrderInput,
  UpdateOrderItemInput,
} from '../../connections/db/models';
import { foreignKey, idSchema, listQuerySchema, money, nonEmpty, quantity } from '../../utils/validation';
import { ORDER_STATUSES, PAYMENT_METHODS } from '../../constants/order.constants';

const orderStatusSchema = z.enum(ORDER_STATUSES);

export const createOrderSchema: z.ZodType<CreateOrderInput> = z.object({
  user_id: foreignKey,
  status: orderStatusSchema.optional(),
  total_amount: money.optional(),
});

export const updateOrderSchema: z.ZodType<UpdateOrderInput> = z.object({
  status: orderStatusSchema.optional(),
});

export const createOrderItemSchema: z.ZodType<CreateOrderItemInput> = z.object({
  order_id: foreignKey,
  product_id: foreignKey,
  quantity: quantity('Quantity must be greater than 0'),
  unit_price: money,
});

export const updateOrderItemSchema: z.ZodType<UpdateOrderItemInput> = z.object({
  quantity: quantity('Quantity must be greater than 0').optional(),
});

export const checkoutSchema = z.object({
  shipping_address: nonEmpty('Shipping address', 1000),
  payment_method: z.enum(PAYMENT_METHODS),
});

export const orderQuerySchema = listQuerySchema.extend({
  user_id: idSchema.optional(),
  status: orderStatusSchema.optional(),
});

export const orderItemQuerySchema = listQuerySchema.extend({
  order_id: idSchema.optional(),
  product_id: idSchema.optional(),
});
