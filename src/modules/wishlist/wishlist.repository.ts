import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  CreateWishlistInput,
  UpdateWishlistInput,
  WishlistEntry,
  WishlistFilter,
} from '../../connections/db/models';
import { NotFoundError } from '../../utils/errors';
import { createWishlistSchema, updateWishlistSchema } from './wishlist.validation';

export class WishlistRepository extends BaseRepository<
  WishlistEntry,
  CreateWishlistInput,
  UpdateWishlistInput,
  WishlistFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'wishlist',
      entity: 'Wishlist entry',
      createSchema: createWishlistSchema,
      updateSchema: updateWishlistSchema,
      filterColumns: ['user_id', 'product_id'],
      touchUpdatedAt: false,
    });
  }

  protected mapRow(row: QueryResultRow): WishlistEntry {
    return {
      id: row.id,
      user_id: row.user_id,
      product_id: row.product_id,
      created_at: row.created_at,
    };
  }

  protected async beforeCreate(input: CreateWishlistInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'users', input.user_id, 'User');
    await this.assertReferenceExists(db, 'products', input.product_id, 'Product');
    await this.assertUnique(
      db,
      { user_id: input.user_id, product_id: input.product_id },
      'Product is already in the wishlist'
    );
  }

  async listForUser(userId: number, tx?: Queryable): Promise<WishlistEntry[]> {
    return this.list({ user_id: userId }, {}, tx);
  }

  async removeProduct(userId: number, productId: number, tx?: Queryable): Promise<void> {
    const result = await (tx ?? this.db).query(
      'DELETE FROM wishlist WHERE user_id = $1 AND product_id = $2 RETURNING id',
      [userId, productId]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError(`Product ${productId} is not in the wishlist`, { product_id: productId });
    }
  }
}
