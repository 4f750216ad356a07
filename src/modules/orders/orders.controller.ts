import type { Request } from 'express';
import type { Repositories, Services } from '../../context';
import { checkoutSchema, orderQuerySchema } from './orders.validation';
import { createCrudHandlers } from '../shared/crud.controller';
import { asyncHandler } from '../../utils/async-handler';
import { assertOwnerOrAdmin, requireUser } from '../../utils/access';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

type OrderRepositories = Pick<Repositories, 'orders' | 'orderItems' | 'payments' | 'shipping'>;

export const createOrdersController = (
  { orders, orderItems, payments, shipping }: OrderRepositories,
  { checkout }: Pick<Services, 'checkout'>
) => {
  const crud = createCrudHandlers(orders, orderQuerySchema);

  const loadOwned = async (req: Request) => {
    const user = requireUser(req);
    const order = await orders.get(parseId(req.params.id, 'order id'));
    assertOwnerOrAdmin(user, order.user_id, 'order');
    return order;
  };

  return {
    createOrder: crud.create,
    updateOrder: crud.update,
    deleteOrder: crud.remove,

    // Customers only ever see their own orders; admins may filter by any user
    getOrders: asyncHandler(async (req, res) => {
      const user = requireUser(req);
      const query = parseWith(orderQuerySchema, req.query, 'Invalid query parameters');
      const filter = user.is_admin ? query : { ...query, user_id: user.id };
      const list = await orders.list(filter, { limit: query.limit, offset: query.offset });
      ResponseHandler.success(res, list);
    }),

    getOrderById: asyncHandler(async (req, res) => {
      ResponseHandler.success(res, await loadOwned(req));
    }),

    getOrderItems: asyncHandler(async (req, res) => {
      const order = await loadOwned(req);
      ResponseHandler.success(res, await orderItems.listByOrder(order.id));
    }),

    getOrderPayment: asyncHandler(async (req, res) => {
      const order = await loadOwned(req);
      ResponseHandler.success(res, await payments.getByOrder(order.id));
    }),

    getOrderShipping: asyncHandler(async (req, res) => {
      const order = await loadOwned(req);
      ResponseHandler.success(res, await shipping.getByOrder(order.id));
    }),

    checkout: asyncHandler(async (req, res) => {
      const user = requireUser(req);
      const input = parseWith(checkoutSchema, req.body, 'Invalid checkout data');
      const placed = await checkout.placeOrder(user.id, input);
      ResponseHandler.created(res, placed, 'Order placed');
    }),
  };
};
