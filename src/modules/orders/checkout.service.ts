import type { Pool } from 'pg';
import type { Order, OrderItem, Payment, PaymentMethod, Shipping } from '../../connections/db/models';
import { withTransaction } from '../../connections/db/transaction';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import type { CartItemRepository } from '../cart/cart-items.repository';
import type { CartRepository } from '../cart/cart.repository';
import type { InventoryRepository } from '../inventory/inventory.repository';
import type { PaymentRepository } from '../payment/payments.repository';
import type { ShippingRepository } from '../shipping/shipping.repository';
import type { OrderItemRepository } from './order-items.repository';
import type { OrderRepository } from './orders.repository';

export interface CheckoutInput {
  shipping_address: string;
  payment_method: PaymentMethod;
}

export interface PlacedOrder {
  order: Order;
  items: OrderItem[];
  payment: Payment;
  shipping: Shipping;
}

export interface CheckoutRepositories {
  carts: CartRepository;
  cartItems: CartItemRepository;
  inventory: InventoryRepository;
  orders: OrderRepository;
  orderItems: OrderItemRepository;
  payments: PaymentRepository;
  shipping: ShippingRepository;
}

/**
 * Turns a user's cart into an order. Everything happens in one transaction:
 * stock is checked for every line and then taken, the order with its items,
 * a pending payment and a pending shipping record are written, and the cart
 * is emptied.
 */
export class CheckoutService {
  constructor(
    private readonly db: Pool,
    private readonly repos: CheckoutRepositories
  ) {}

  async placeOrder(userId: number, input: CheckoutInput): Promise<PlacedOrder> {
    const placed = await withTransaction(this.db, async client => {
      const cartItems = await this.repos.cartItems.listDetailedForUser(userId, client);
      if (cartItems.length === 0) {
        throw new ValidationError('Cart is empty');
      }

      // Every line is checked before the first stock write
      for (const item of cartItems) {
        await this.repos.inventory.assertAvailable(item.product_id, item.quantity, client);
      }
      for (const item of cartItems) {
        await this.repos.inventory.adjust(item.product_id, -item.quantity, client);
      }

      const totalCents = cartItems.reduce(
        (sum, item) => sum + Math.round(item.unit_price * 100) * item.quantity,
        0
      );
      const total = totalCents / 100;

      const order = await this.repos.orders.create({ user_id: userId, total_amount: total }, client);

      const items: OrderItem[] = [];
      for (const item of cartItems) {
        items.push(
          await this.repos.orderItems.create(
            {
              order_id: order.id,
              product_id: item.product_id,
              quantity: item.quantity,
              unit_price: item.unit_price,
            },
            client
          )
        );
      }

      const payment = await this.repos.payments.create(
        { order_id: order.id, amount: total, method: input.payment_method },
        client
      );
      const shipping = await this.repos.shipping.create(
        { order_id: order.id, address: input.shipping_address },
        client
      );

      await this.repos.carts.clear(cartItems[0].cart_id, client);

      return { order, items, payment, shipping };
    });

    logger.info('Order placed', { orderId: placed.order.id, userId, total: placed.order.total_amount });
    return placed;
  }
}
