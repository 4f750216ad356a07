import { describe, it, expect, beforeEach } from 'vitest';
import type { AppContext } from '../context';
import type { Category, User } from '../connections/db/models';
import { ValidationError } from '../utils/errors';
import { createCategory, createStockedProduct, createTestContext, createUser } from './helpers/db';

describe('CartService', () => {
  let context: AppContext;
  let user: User;
  let category: Category;

  beforeEach(async () => {
    context = await createTestContext();
    user = await createUser(context);
    category = await createCategory(context);
  });

  it('should return an empty cart for a new user', async () => {
    const view = await context.services.cart.getCart(user.id);

    expect(view.items).toEqual([]);
    expect(view.total).toBe(0);
    expect((await context.repositories.carts.findByUser(user.id))?.id).toBe(view.cart_id);
  });

  it('should merge quantities when the same product is added twice', async () => {
    const { cart } = context.services;
    const lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 7.25, stock: 10 });

    const first = await cart.addItem(user.id, lamp.id, 2);
    const second = await cart.addItem(user.id, lamp.id, 3);

    expect(second.id).toBe(first.id);
    expect(second.quantity).toBe(5);
    expect(await context.repositories.cartItems.listForUser(user.id)).toHaveLength(1);
  });

  it('should price the cart from current product prices', async () => {
    const { cart } = context.services;
    const lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 7.25, stock: 10 });
    const desk = await createStockedProduct(context, category, { name: 'Desk', price: 19.99, stock: 10 });
    await cart.addItem(user.id, lamp.id, 2);
    await cart.addItem(user.id, desk.id, 1);

    const view = await cart.getCart(user.id);

    expect(view.items.map(item => [item.product_name, item.unit_price, item.quantity])).toEqual([
      ['Lamp', 7.25, 2],
      ['Desk', 19.99, 1],
    ]);
    expect(view.total).toBe(34.49);
  });

  it('should not add more than the stock on hand', async () => {
    const lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 5, stock: 2 });

    await expect(context.services.cart.addItem(user.id, lamp.id, 3)).rejects.toMatchObject({
      message: `Insufficient stock for product ${lamp.id}`,
      details: { product_id: lamp.id, available: 2, requested: 3 },
    });
  });

  it('should treat a product without inventory as out of stock', async () => {
    const product = await context.repositories.products.create({ category_id: category.id, name: 'Vase', price: 9 });

    await expect(context.services.cart.addItem(user.id, product.id, 1)).rejects.toThrow(ValidationError);
  });

  it('should refuse inactive products', async () => {
    const lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 5, stock: 2 });
    await context.repositories.products.update(lamp.id, { is_active: false });

    await expect(context.services.cart.addItem(user.id, lamp.id, 1)).rejects.toThrow('Product is not available');
  });

  it('should update quantities and clear the cart', async () => {
    const { cart } = context.services;
    const lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 5, stock: 4 });
    const item = await cart.addItem(user.id, lamp.id, 1);

    expect((await cart.updateItemQuantity(item.id, 4)).quantity).toBe(4);
    await expect(cart.updateItemQuantity(item.id, 5)).rejects.toThrow(ValidationError);

    await cart.clear(user.id);

    expect((await cart.getCart(user.id)).items).toEqual([]);
  });
});
