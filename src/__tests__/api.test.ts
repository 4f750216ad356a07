import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import type { AppContext } from '../context';
import type { User } from '../connections/db/models';
import { createCategory, createStockedProduct, createTestContext, createUser } from './helpers/db';
import { dataId, startTestServer } from './helpers/http';
import type { TestServer } from './helpers/http';

const authResultSchema = z.object({
  token: z.string(),
  user: z.object({ id: z.number(), email: z.string() }).passthrough(),
});

describe('HTTP API', () => {
  let context: AppContext;
  let server: TestServer;

  const tokenFor = (user: User) => context.services.auth.signToken(user.id);

  const createAdmin = async () => {
    const user = await createUser(context);
    await context.repositories.admins.create({ user_id: user.id });
    return user;
  };

  beforeEach(async () => {
    context = await createTestContext();
    server = await startTestServer(context);
  });

  afterEach(async () => {
    await server.close();
  });

  describe('health and routing', () => {
    it('should report a connected database', async () => {
      const response = await fetch(`${server.origin}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok', database: 'connected' });
    });

    it('should refuse browser calls from an unknown origin with 403', async () => {
      const refused = await fetch(`${server.origin}/health`, { headers: { Origin: 'https://elsewhere.example' } });
      const allowed = await fetch(`${server.origin}/health`, { headers: { Origin: 'http://localhost:5173' } });

      expect(refused.status).toBe(403);
      expect(await refused.json()).toEqual({
        success: false,
        message: 'Origin https://elsewhere.example is not allowed',
        error: { code: 'FORBIDDEN' },
      });
      expect(allowed.status).toBe(200);
      expect(allowed.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
    });

    it('should answer unknown routes with 404', async () => {
      const { status, body } = await server.request('GET', '/nothing-here');

      expect(status).toBe(404);
      expect(body).toEqual({ success: false, message: 'Route not found', error: { code: 'NOT_FOUND' } });
    });

    it('should reject malformed JSON bodies', async () => {
      const { status, body } = await server.request('POST', '/auth/login', { rawBody: '{"email":' });

      expect(status).toBe(400);
      expect(body.message).toBe('Malformed JSON body');
      expect(body.error?.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('auth', () => {
    it('should register, log in and resolve the caller', async () => {
      const registered = await server.request('POST', '/auth/register', {
        body: { email: 'dana@example.com', password: 'test-password', full_name: 'Dana' },
      });

      expect(registered.status).toBe(201);
      expect(registered.body.message).toBe('Registration successful');
      const { user } = authResultSchema.parse(registered.body.data);
      expect(user.email).toBe('dana@example.com');
      expect(user).not.toHaveProperty('password_hash');

      const login = await server.request('POST', '/auth/login', {
        body: { email: 'DANA@example.com', password: 'test-password' },
      });
      expect(login.status).toBe(200);
      const { token } = authResultSchema.parse(login.body.data);

      const me = await server.request('GET', '/auth/me', { token });
      expect(me.status).toBe(200);
      expect(me.body.data).toMatchObject({ id: user.id, email: 'dana@example.com', is_admin: false, admin_level: null });
    });

    it('should reject a wrong password', async () => {
      await createUser(context, { email: 'erin@example.com' });

      const { status, body } = await server.request('POST', '/auth/login', {
        body: { email: 'erin@example.com', password: 'wrong-password' },
      });

      expect(status).toBe(401);
      expect(body).toEqual({
        success: false,
        message: 'Incorrect email or password',
        error: { code: 'UNAUTHORIZED' },
      });
    });

    it('should describe invalid registration data', async () => {
      const { status, body } = await server.request('POST', '/auth/register', {
        body: { email: 'nope', password: 'short', full_name: 'Frank' },
      });

      expect(status).toBe(400);
      expect(body.message).toBe('Invalid registration data');
      expect(body.error).toEqual({
        code: 'VALIDATION_ERROR',
        details: [
          { path: 'email', message: 'Invalid email' },
          { path: 'password', message: 'Password must be at least 8 characters' },
        ],
      });
    });

    it('should require a valid bearer token', async () => {
      const missing = await server.request('GET', '/auth/me');
      const invalid = await server.request('GET', '/auth/me', { token: 'not-a-jwt' });

      expect(missing.status).toBe(401);
      expect(missing.body.message).toBe('Token not provided');
      expect(invalid.status).toBe(401);
      expect(invalid.body.message).toBe('Invalid or expired token');
    });
  });

  describe('categories', () => {
    it('should let only admins create categories', async () => {
      const customer = await createUser(context);

      const { status, body } = await server.request('POST', '/categories', {
        body: { name: 'Books' },
        token: tokenFor(customer),
      });

      expect(status).toBe(403);
      expect(body.message).toBe('Admin access required');
    });

    it('should create a category and record it in the audit log', async () => {
      const admin = await createAdmin();

      const created = await server.request('POST', '/categories', {
        body: { name: 'Books', description: 'Paper and ink' },
        token: tokenFor(admin),
      });

      expect(created.status).toBe(201);
      expect(created.body.message).toBe('Category created');
      const categoryId = dataId(created.body);

      const listed = await server.request('GET', '/categories');
      expect(listed.status).toBe(200);
      expect(listed.body.data).toMatchObject([{ id: categoryId, name: 'Books', description: 'Paper and ink' }]);

      await vi.waitFor(async () => {
        const entries = await context.repositories.auditLogs.list({ entity_type: 'category' });
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({ actor_id: admin.id, action: 'create', entity_id: categoryId });
      });
    });

    it('should refuse to delete a category that has products', async () => {
      const admin = await createAdmin();
      const category = await createCategory(context);
      await createStockedProduct(context, category, { name: 'Novel', price: 10, stock: 1 });

      const { status, body } = await server.request('DELETE', `/categories/${category.id}`, {
        token: tokenFor(admin),
      });

      expect(status).toBe(400);
      expect(body.message).toBe('Category still has products; move or delete them first');
      expect(body.error?.code).toBe('VALIDATION_ERROR');
    });

    it('should reject a non-numeric id', async () => {
      const { status, body } = await server.request('GET', '/categories/abc');

      expect(status).toBe(400);
      expect(body.message).toBe('Invalid category id');
    });

    it('should reject an id beyond the integer column range', async () => {
      const { status, body } = await server.request('GET', '/categories/3000000000');

      expect(status).toBe(400);
      expect(body).toEqual({
        success: false,
        message: 'Invalid category id',
        error: { code: 'VALIDATION_ERROR', details: { 'category id': '3000000000' } },
      });
    });

    it('should answer a missing category with 404', async () => {
      const { status, body } = await server.request('GET', '/categories/99');

      expect(status).toBe(404);
      expect(body.message).toBe('Category 99 not found');
    });
  });

  describe('products', () => {
    it('should create a product with its opening stock', async () => {
      const seller = await createUser(context, { role: 'seller' });
      const category = await createCategory(context);

      const created = await server.request('POST', '/products', {
        body: { category_id: category.id, name: 'Lamp', price: 12.5, stock_quantity: 3 },
        token: tokenFor(seller),
      });

      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({
        category_id: category.id,
        seller_id: seller.id,
        name: 'Lamp',
        price: 12.5,
        inventory: { stock_quantity: 3 },
      });

      const stock = await server.request('GET', `/products/${dataId(created.body)}/inventory`);
      expect(stock.status).toBe(200);
      expect(stock.body.data).toMatchObject({ product_id: dataId(created.body), stock_quantity: 3 });
    });

    it('should keep sellers to their own products', async () => {
      const owner = await createUser(context, { role: 'seller' });
      const rival = await createUser(context, { role: 'seller' });
      const category = await createCategory(context);
      const product = await context.repositories.products.create({
        category_id: category.id,
        seller_id: owner.id,
        name: 'Lamp',
        price: 5,
      });

      const denied = await server.request('PUT', `/products/${product.id}`, {
        body: { price: 1 },
        token: tokenFor(rival),
      });
      const allowed = await server.request('PUT', `/products/${product.id}`, {
        body: { price: 6 },
        token: tokenFor(owner),
      });

      expect(denied.status).toBe(403);
      expect(denied.body.message).toBe('You do not have access to this product');
      expect(allowed.status).toBe(200);
      expect(allowed.body.data).toMatchObject({ id: product.id, price: 6 });
    });

    it('should not let customers list products for sale', async () => {
      const customer = await createUser(context);
      const category = await createCategory(context);

      const { status, body } = await server.request('POST', '/products', {
        body: { category_id: category.id, name: 'Lamp', price: 5 },
        token: tokenFor(customer),
      });

      expect(status).toBe(403);
      expect(body.message).toBe('Access denied');
    });
  });

  describe('cart and orders', () => {
    it('should check out the cart and expose the order to its owner only', async () => {
      const customer = await createUser(context);
      const stranger = await createUser(context);
      const category = await createCategory(context);
      const lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 7.25, stock: 5 });
      const token = tokenFor(customer);

      const added = await server.request('POST', '/cart/items', { body: { product_id: lamp.id, quantity: 2 }, token });
      expect(added.status).toBe(201);

      const cart = await server.request('GET', '/cart', { token });
      expect(cart.body.data).toMatchObject({ total: 14.5, items: [{ product_id: lamp.id, quantity: 2 }] });

      const placed = await server.request('POST', '/orders/checkout', {
        body: { shipping_address: '1 Main St', payment_method: 'cash_on_delivery' },
        token,
      });
      expect(placed.status).toBe(201);
      const { order } = z.object({ order: z.object({ id: z.number(), total_amount: z.number() }) }).parse(placed.body.data);
      expect(order.total_amount).toBe(14.5);

      const payment = await server.request('GET', `/orders/${order.id}/payment`, { token });
      expect(payment.body.data).toMatchObject({ order_id: order.id, amount: 14.5, method: 'cash_on_delivery' });

      const items = await server.request('GET', `/orders/${order.id}/items`, { token });
      expect(items.body.data).toMatchObject([{ product_id: lamp.id, quantity: 2, unit_price: 7.25 }]);

      const mine = await server.request('GET', '/orders', { token });
      expect(mine.body.data).toMatchObject([{ id: order.id }]);

      const theirs = await server.request('GET', '/orders', { token: tokenFor(stranger) });
      expect(theirs.body.data).toEqual([]);

      const peek = await server.request('GET', `/orders/${order.id}`, { token: tokenFor(stranger) });
      expect(peek.status).toBe(403);

      const emptied = await server.request('GET', '/cart', { token });
      expect(emptied.body.data).toMatchObject({ total: 0, items: [] });
    });

    it('should reject checkout of an empty cart', async () => {
      const customer = await createUser(context);

      const { status, body } = await server.request('POST', '/orders/checkout', {
        body: { shipping_address: '1 Main St', payment_method: 'card' },
        token: tokenFor(customer),
      });

      expect(status).toBe(400);
      expect(body.message).toBe('Cart is empty');
    });

    it('should let admins move an order to a new status', async () => {
      const admin = await createAdmin();
      const customer = await createUser(context);
      const order = await context.repositories.orders.create({ user_id: customer.id });

      const denied = await server.request('PUT', `/orders/${order.id}`, {
        body: { status: 'shipped' },
        token: tokenFor(customer),
      });
      const updated = await server.request('PUT', `/orders/${order.id}`, {
        body: { status: 'shipped' },
        token: tokenFor(admin),
      });

      expect(denied.status).toBe(403);
      expect(updated.status).toBe(200);
      expect(updated.body.data).toMatchObject({ id: order.id, status: 'shipped' });
    });

    it('should reject an unknown order status', async () => {
      const admin = await createAdmin();
      const customer = await createUser(context);
      const order = await context.repositories.orders.create({ user_id: customer.id });

      const { status, body } = await server.request('PUT', `/orders/${order.id}`, {
        body: { status: 'lost' },
        token: tokenFor(admin),
      });

      expect(status).toBe(400);
      expect(body.message).toBe('Invalid order data');
    });
  });

  describe('wishlist', () => {
    it('should add and remove products', async () => {
      const customer = await createUser(context);
      const category = await createCategory(context);
      const lamp = await createStockedProduct(context, category, { name: 'Lamp', price: 5, stock: 1 });
      const token = tokenFor(customer);

      const added = await server.request('POST', '/wishlist', { body: { product_id: lamp.id }, token });
      const removed = await server.request('DELETE', `/wishlist/${lamp.id}`, { token });
      const again = await server.request('DELETE', `/wishlist/${lamp.id}`, { token });

      expect(added.status).toBe(201);
      expect(removed.status).toBe(200);
      expect(again.status).toBe(404);
      expect(again.body.message).toBe(`Product ${lamp.id} is not in the wishlist`);
    });
  });
});
