import type { WishlistRepository } from './wishlist.repository';
import { wishlistBodySchema } from './wishlist.validation';
import { asyncHandler } from '../../utils/async-handler';
import { requireUser } from '../../utils/access';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

export const createWishlistController = (wishlist: WishlistRepository) => ({
  getWishlist: asyncHandler(async (req, res) => {
    ResponseHandler.success(res, await wishlist.listForUser(requireUser(req).id));
  }),

  addToWishlist: asyncHandler(async (req, res) => {
    const user = requireUser(req);
    const { product_id } = parseWith(wishlistBodySchema, req.body, 'Invalid wishlist entry');
    const entry = await wishlist.create({ user_id: user.id, product_id });
    ResponseHandler.created(res, entry, 'Added to wishlist');
  }),

  removeFromWishlist: asyncHandler(async (req, res) => {
    const user = requireUser(req);
    await wishlist.removeProduct(user.id, parseId(req.params.product_id, 'product id'));
    ResponseHandler.success(res, null, 'Removed from wishlist');
  }),
});
