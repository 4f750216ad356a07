import type { Request } from 'express';
import type { Pool } from 'pg';
import type { Repositories } from '../../context';
import { withTransaction } from '../../connections/db/transaction';
import { productBodySchema, productQuerySchema } from './products.validation';
import { createCrudHandlers } from '../shared/crud.controller';
import { asyncHandler } from '../../utils/async-handler';
import { assertOwnerOrAdmin, requireUser } from '../../utils/access';
import { logger } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { parseId, parseWith } from '../../utils/validation';

type ProductRepositories = Pick<Repositories, 'products' | 'inventory' | 'reviews'>;

export const createProductsController = (db: Pool, { products, inventory, reviews }: ProductRepositories) => {
  const crud = createCrudHandlers(products, productQuerySchema);

  // Sellers manage their own listings, admins manage all of them
  const loadOwned = async (req: Request) => {
    const user = requireUser(req);
    const product = await products.get(parseId(req.params.id, 'product id'));
    assertOwnerOrAdmin(user, product.seller_id, 'product');
    return product;
  };

  return {
    getProducts: crud.list,
    getProductById: crud.get,

    getProductInventory: asyncHandler(async (req, res) => {
      const product = await products.get(parseId(req.params.id, 'product id'));
      ResponseHandler.success(res, await inventory.getByProduct(product.id));
    }),

    getProductReviews: asyncHandler(async (req, res) => {
      const product = await products.get(parseId(req.params.id, 'product id'));
      ResponseHandler.success(res, await reviews.listByProduct(product.id));
    }),

    /**
     * Creates the product and, when `stock_quantity` is given, its inventory
     * record in the same transaction.
     */
    createProduct: asyncHandler(async (req, res) => {
      const user = requireUser(req);
      const { stock_quantity, ...input } = parseWith(productBodySchema, req.body, 'Invalid product data');
      const sellerId = user.is_admin ? input.seller_id ?? null : user.id;

      const result = await withTransaction(db, async client => {
        const product = await products.create({ ...input, seller_id: sellerId }, client);
        const stock =
          stock_quantity === undefined
            ? null
            : await inventory.create({ product_id: product.id, stock_quantity }, client);
        return { ...product, inventory: stock };
      });

      res.locals.entityId = result.id;
      logger.info('Product created', { productId: result.id, sellerId });
      ResponseHandler.created(res, result, 'Product created');
    }),

    updateProduct: asyncHandler(async (req, res) => {
      const existing = await loadOwned(req);
      const product = await products.update(existing.id, req.body ?? {});
      res.locals.entityId = product.id;
      ResponseHandler.success(res, product, 'Product updated');
    }),

    deleteProduct: asyncHandler(async (req, res) => {
      const existing = await loadOwned(req);
      await products.delete(existing.id);
      res.locals.entityId = existing.id;
      ResponseHandler.success(res, null, 'Product deleted');
    }),
  };
};
