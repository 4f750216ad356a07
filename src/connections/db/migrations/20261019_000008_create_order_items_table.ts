import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS order_items (
        id SERIAL PRIMARY KEY,
        order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE RESTRICT,
        quantity INTEGER NOT NULL,
        unit_price DECIMAL(10, 2) NOT NULL,
        created_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    await db.query('CREATE INDEX idx_order_items_order ON order_items(order_id)');
    await db.query('CREATE INDEX idx_order_items_product ON order_items(product_id)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_order_items_product');
    await db.query('DROP INDEX IF EXISTS idx_order_items_order');
    await db.query('DROP TABLE IF EXISTS order_items CASCADE');
  },
};
