import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type { CreateReviewInput, Review, ReviewFilter, UpdateReviewInput } from '../../connections/db/models';
import { createReviewSchema, updateReviewSchema } from './reviews.validation';

export class ReviewRepository extends BaseRepository<Review, CreateReviewInput, UpdateReviewInput, ReviewFilter> {
  constructor(db: Queryable) {
    super(db, {
      table: 'reviews',
      entity: 'Review',
      createSchema: createReviewSchema,
      updateSchema: updateReviewSchema,
      filterColumns: ['user_id', 'product_id'],
    });
  }

  protected mapRow(row: QueryResultRow): Review {
    return {
      id: row.id,
      user_id: row.user_id,
      product_id: row.product_id,
      rating: row.rating,
      comment: row.comment ?? null,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected async beforeCreate(input: CreateReviewInput, db: Queryable): Promise<void> {
    await this.assertReferenceExists(db, 'users', input.user_id, 'User');
    await this.assertReferenceExists(db, 'products', input.product_id, 'Product');
    await this.assertUnique(
      db,
      { user_id: input.user_id, product_id: input.product_id },
      'You have already reviewed this product'
    );
  }

  async listByProduct(productId: number, tx?: Queryable): Promise<Review[]> {
    return this.list({ product_id: productId }, {}, tx);
  }
}
