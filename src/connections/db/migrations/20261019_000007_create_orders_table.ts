import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        total_amount DECIMAL(10, 2) NOT NULL DEFAULT 0,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    await db.query('CREATE INDEX idx_orders_user ON orders(user_id)');
    await db.query('CREATE INDEX idx_orders_status ON orders(status)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_orders_status');
    await db.query('DROP INDEX IF EXISTS idx_orders_user');
    await db.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
