import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS reviews (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        rating INTEGER NOT NULL,
        comment TEXT,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW(),
        UNIQUE (user_id, product_id)
      )
    `);

    await db.query('CREATE INDEX idx_reviews_product ON reviews(product_id)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_reviews_product');
    await db.query('DROP TABLE IF EXISTS reviews CASCADE');
  },
};
