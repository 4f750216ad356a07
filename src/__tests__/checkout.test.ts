import { describe, it, expect, beforeEach } from 'vitest';
import type { AppContext } from '../context';
import type { Category, Product, User } from '../connections/db/models';
import { createCategory, createStockedProduct, createTestContext, createUser } from './helpers/db';

describe('CheckoutService', () => {
  let context: AppContext;
  let user: User;
  let category: Category;
  let lamp: Product;
  let desk: Product;

  beforeEach(async () => {
    context = await createTestContext();
    user = await createUser(context);
    category = await createCategory(context);
    lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 7.25, stock: 5 });
    desk = await createStockedProduct(context, category, { name: 'Desk', price: 19.99, stock: 1 });
  });

  it('should turn the cart into an order with payment and shipping', async () => {
    const { cart, checkout } = context.services;
    const { inventory, orders } = context.repositories;
    await cart.addItem(user.id, lamp.id, 2);
    await cart.addItem(user.id, desk.id, 1);

    const placed = await checkout.placeOrder(user.id, {
      shipping_address: '1 Main St, Springfield',
      payment_method: 'card',
    });

    expect(placed.order.user_id).toBe(user.id);
    expect(placed.order.status).toBe('pending');
    expect(placed.order.total_amount).toBe(34.49);
    expect(placed.items.map(item => [item.product_id, item.quantity, item.unit_price])).toEqual([
      [lamp.id, 2, 7.25],
      [desk.id, 1, 19.99],
    ]);
    expect(placed.payment).toMatchObject({ order_id: placed.order.id, amount: 34.49, method: 'card', status: 'pending' });
    expect(placed.shipping).toMatchObject({
      order_id: placed.order.id,
      address: '1 Main St, Springfield',
      status: 'pending',
    });

    expect((await inventory.getByProduct(lamp.id)).stock_quantity).toBe(3);
    expect((await inventory.getByProduct(desk.id)).stock_quantity).toBe(0);
    expect(await context.repositories.cartItems.listForUser(user.id)).toEqual([]);
    expect(await orders.listByUser(user.id)).toEqual([placed.order]);
  });

  it('should reject an empty cart', async () => {
    await expect(
      context.services.checkout.placeOrder(user.id, { shipping_address: '1 Main St', payment_method: 'wallet' })
    ).rejects.toThrow('Cart is empty');
    expect(await context.repositories.orders.listByUser(user.id)).toEqual([]);
  });

  it('should take no stock from any line when a later line is out of stock', async () => {
    const { cart, checkout } = context.services;
    const { inventory, orders, cartItems } = context.repositories;
    await cart.addItem(user.id, lamp.id, 2);
    await cart.addItem(user.id, desk.id, 1);
    await inventory.adjust(desk.id, -1);

    const failure = checkout.placeOrder(user.id, { shipping_address: '1 Main St', payment_method: 'card' });
    await expect(failure).rejects.toThrow(`Insufficient stock for product ${desk.id}`);
    await expect(failure).rejects.toMatchObject({
      details: { product_id: desk.id, available: 0, requested: 1 },
    });

    expect((await inventory.getByProduct(lamp.id)).stock_quantity).toBe(5);
    expect((await inventory.getByProduct(desk.id)).stock_quantity).toBe(0);
    expect(await cartItems.listForUser(user.id)).toHaveLength(2);
    expect(await orders.listByUser(user.id)).toEqual([]);
  });
});
