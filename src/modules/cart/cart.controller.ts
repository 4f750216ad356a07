import type { Request } from 'express';
import type { CartItemRepository } from './cart-items.repository';
import type { CartRepository } from './cart.repository';
import type { CartService } from './cart.service';
import { addCartItemBodySchema, updateCartItemBodySchema } from './cart.validation';
import { asyncHandler } from '../../utils/async-handler';
import { assertOwnerOrAdmin, requireUser } from '../../utils/access';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

export const createCartController = (cart: CartService, carts: CartRepository, cartItems: CartItemRepository) => {
  // Cart items belong to whoever owns the cart
  const loadOwnedItem = async (req: Request) => {
    const user = requireUser(req);
    const item = await cartItems.get(parseId(req.params.id, 'cart item id'));
    const owner = await carts.get(item.cart_id);
    assertOwnerOrAdmin(user, owner.user_id, 'cart item');
    return item;
  };

  return {
    getCart: asyncHandler(async (req, res) => {
      ResponseHandler.success(res, await cart.getCart(requireUser(req).id));
    }),

    addToCart: asyncHandler(async (req, res) => {
      const user = requireUser(req);
      const { product_id, quantity } = parseWith(addCartItemBodySchema, req.body, 'Invalid cart item');
      const item = await cart.addItem(user.id, product_id, quantity);
      ResponseHandler.created(res, item, 'Added to cart');
    }),

    updateCartItem: asyncHandler(async (req, res) => {
      const existing = await loadOwnedItem(req);
      const { quantity } = parseWith(updateCartItemBodySchema, req.body, 'Invalid cart item');
      const item = await cart.updateItemQuantity(existing.id, quantity);
      ResponseHandler.success(res, item, 'Cart updated');
    }),

    removeCartItem: asyncHandler(async (req, res) => {
      const existing = await loadOwnedItem(req);
      await cartItems.delete(existing.id);
      ResponseHandler.success(res, null, 'Removed from cart');
    }),

    clearCart: asyncHandler(async (req, res) => {
      await cart.clear(requireUser(req).id);
      ResponseHandler.success(res, null, 'Cart cleared');
    }),
  };
};
