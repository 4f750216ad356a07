import type { QueryResultRow } from 'pg';
import { BaseRepository, toNumber } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  CartItem,
  CartItemDetail,
  CartItemFilter,
  CreateCartItemInput,
  UpdateCartItemInput,
} from '../../connections/db/models';
import { createCartItemSchema, updateCartItemSchema } from './cart.validation';

export class CartItemRepository extends BaseRepository<
  CartItem,
  CreateCartItemInput,
  UpdateCartItemInput,
  CartItemFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'cart_items',
      entity: 'Cart item',
      createSchema: createCartItemSchema,
      updateSchema: updateCartItemSchema,
      filterColumns: ['cart_id', 'product_id'],
    });
  }

  protected mapRow(row: QueryResultRow): CartItem {
    return {
      id: row.id,
      cart_id: row.cart_id,
      product_id: row.product_id,
      quantity: row.quantity,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateCartItemInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'carts', input.cart_id, 'Cart');
    await this.assertReferenceExists(db, 'products', input.product_id, 'Product');
    await this.assertUnique(
      db,
      { cart_id: input.cart_id, product_id: input.product_id },
      'Product is already in the cart'
    );
  }

  async findByCartAndProduct(cartId: number, productId: number, tx?: Queryable): Promise<CartItem | undefined> {
    const rows = await this.selectRows(
      'SELECT * FROM cart_items WHERE cart_id = $1 AND product_id = $2',
      [cartId, productId],
      tx
    );
    return rows[0];
  }

  /** Items currently in the user's cart, oldest first. */
  async listForUser(userId: number, tx?: Queryable): Promise<CartItem[]> {
    return this.selectRows(
      `SELECT ci.*
       FROM cart_items ci
       JOIN carts c ON c.id = ci.cart_id
       WHERE c.user_id = $1
       ORDER BY ci.id ASC`,
      [userId],
      tx
    );
  }

  async listDetailedForUser(userId: number, tx?: Queryable): Promise<CartItemDetail[]> {
    const result = await (tx ?? this.db).query(
      `SELECT ci.*, p.name AS product_name, p.price AS unit_price
       FROM cart_items ci
       JOIN carts c ON c.id = ci.cart_id
       JOIN products p ON p.id = ci.product_id
       WHERE c.user_id = $1
       ORDER BY ci.id ASC`,
      [userId]
    );

    return result.rows.map(row => ({
      ...this.mapRow(row),
      product_name: row.product_name,
      unit_price: toNumber(row.unit_price),
    }));
  }
}
