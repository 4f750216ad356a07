import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS wishlist (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        UNIQUE (user_id, product_id)
      )
    `);

    await db.query('CREATE INDEX idx_wishlist_user ON wishlist(user_id)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_wishlist_user');
    await db.query('DROP TABLE IF EXISTS wishlist CASCADE');
  },
};
