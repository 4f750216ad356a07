import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    // A category cannot be dropped while products still point at it
    await db.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE RESTRICT,
        seller_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        name VARCHAR(255) NOT NULL,
        description TEXT,
        price DECIMAL(10, 2) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    await db.query('CREATE INDEX idx_products_category ON products(category_id)');
    await db.query('CREATE INDEX idx_products_seller ON products(seller_id)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_products_seller');
    await db.query('DROP INDEX IF EXISTS idx_products_category');
    await db.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
