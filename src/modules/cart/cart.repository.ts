import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type { Cart, CartFilter, CreateCartInput, UpdateCartInput } from '../../connections/db/models';
import { createCartSchema, updateCartSchema } from './cart.validation';

export class CartRepository extends BaseRepository<Cart, CreateCartInput, UpdateCartInput, CartFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'carts',
      entity: 'Cart',
      createSchema: createCartSchema,
      updateSchema: updateCartSchema,
      filterColumns: ['user_id'],
    });
  }

  protected mapRow(row: QueryResultRow): Cart {
    return {
      id: row.id,
      user_id: row.user_id,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateCartInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'users', input.user_id, 'User');
    await this.assertUnique(db, { user_id: input.user_id }, 'User already has a cart');
  }

  async findByUser(userId: number, tx?: Queryable): Promise<Cart | undefined> {
    return this.findOneBy('user_id', userId, tx);
  }

  async getOrCreateForUser(userId: number, tx?: Queryable): Promise<Cart> {
    const cart = await this.findByUser(userId, tx);
    return cart ?? this.create({ user_id: userId }, tx);
  }

  /** Remove every item, keeping the cart itself. */
  async clear(cartId: number, tx?: Queryable): Promise<void> {
    await (tx ?? this.db).query('DELETE FROM cart_items WHERE cart_id = $1', [cartId]);
  }
}
