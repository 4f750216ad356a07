import type { CartItem, CartItemDetail } from '../../connections/db/models';
import type { Queryable } from '../../connections/db/queryable';
import { ValidationError } from '../../utils/errors';
import type { InventoryRepository } from '../inventory/inventory.repository';
import type { ProductRepository } from '../products/products.repository';
import type { CartRepository } from './cart.repository';
import type { CartItemRepository } from './cart-items.repository';

export interface CartView {
  cart_id: number;
  items: CartItemDetail[];
  total: number;
}

export class CartService {
  constructor(
    private readonly carts: CartRepository,
    private readonly cartItems: CartItemRepository,
    private readonly products: ProductRepository,
    private readonly inventory: InventoryRepository
  ) {}

  async getCart(userId: number): Promise<CartView> {
    const cart = await this.carts.getOrCreateForUser(userId);
    const items = await this.cartItems.listDetailedForUser(userId);
    const cents = items.reduce((sum, item) => sum + Math.round(item.unit_price * 100) * item.quantity, 0);
    return { cart_id: cart.id, items, total: cents / 100 };
  }

  /**
   * Put a product in the user's cart. Adding a product that is already there
   * increases its quantity.
   */
  async addItem(userId: number, productId: number, quantity: number): Promise<CartItem> {
    const product = await this.products.get(productId);
    if (!product.is_active) {
      throw new ValidationError('Product is not available', { product_id: productId });
    }

    const cart = await this.carts.getOrCreateForUser(userId);
    const existing = await this.cartItems.findByCartAndProduct(cart.id, productId);
    const nextQuantity = (existing?.quantity ?? 0) + quantity;
    await this.assertInStock(productId, nextQuantity);

    if (existing) {
      return this.cartItems.update(existing.id, { quantity: nextQuantity });
    }
    return this.cartItems.create({ cart_id: cart.id, product_id: productId, quantity });
  }

  async updateItemQuantity(itemId: number, quantity: number): Promise<CartItem> {
    const item = await this.cartItems.get(itemId);
    await this.assertInStock(item.product_id, quantity);
    return this.cartItems.update(itemId, { quantity });
  }

  async clear(userId: number, tx?: Queryable): Promise<void> {
    const cart = await this.carts.findByUser(userId, tx);
    if (cart) {
      await this.carts.clear(cart.id, tx);
    }
  }

  private async assertInStock(productId: number, quantity: number): Promise<void> {
    const stock = await this.inventory.findByProduct(productId);
    const available = stock?.stock_quantity ?? 0;
    if (quantity > available) {
      throw new ValidationError(`Insufficient stock for product ${productId}`, {
        product_id: productId,
        available,
        requested: quantity,
      });
    }
  }
}
