import type { QueryResultRow } from 'pg';
import { BaseRepository, toNumber } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type { CreateProductInput, Product, ProductFilter, UpdateProductInput } from '../../connections/db/models';
import { ValidationError } from '../../utils/errors';
import { createProductSchema, updateProductSchema } from './products.validation';

export class ProductRepository extends BaseRepository<Product, CreateProductInput, UpdateProductInput, ProductFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'products',
      entity: 'Product',
      createSchema: createProductSchema,
      updateSchema: updateProductSchema,
      filterColumns: ['category_id', 'seller_id', 'is_active'],
    });
  }

  protected mapRow(row: QueryResultRow): Product {
    return {
      id: row.id,
      category_id: row.category_id,
      seller_id: row.seller_id ?? null,
      name: row.name,
      description: row.description ?? null,
      price: toNumber(row.price),
      is_active: row.is_active,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateProductInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'categories', input.category_id, 'Category');
    if (input.seller_id) {
      await this.assertReferenceExists(db, 'users', input.seller_id, 'User');
    }
  }

  protected async beforeUpdate(_existing: Product, input: UpdateProductInput, db: Queryable): Promise<void> {
    if (input.category_id !== undefined) {
      await this.assertReferenceExists(db, 'categories', input.category_id, 'Category');
    }
  }

  /**
   * Products that appear on an order are kept for the order history.
   * Inventory, cart items, reviews and wishlist entries cascade with the product.
   */
  protected async beforeDelete(existing: Product, db: Queryable): Promise<void> {
    const ordered = await db.query('SELECT id FROM order_items WHERE product_id = $1 LIMIT 1', [existing.id]);
    if (ordered.rows.length > 0) {
      throw new ValidationError('Product has been ordered and cannot be deleted; deactivate it instead', {
        product_id: existing.id,
      });
    }
  }

  async listByCategory(categoryId: number, tx?: Queryable): Promise<Product[]> {
    return this.list({ category_id: categoryId }, {}, tx);
  }

  async listBySeller(sellerId: number, tx?: Queryable): Promise<Product[]> {
    return this.list({ seller_id: sellerId }, {}, tx);
  }
}
