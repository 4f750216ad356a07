import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS shipping (
        id SERIAL PRIMARY KEY,
        order_id INTEGER UNIQUE NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        address TEXT NOT NULL,
        carrier VARCHAR(50),
        tracking_number VARCHAR(100),
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    await db.query('CREATE INDEX idx_shipping_tracking ON shipping(tracking_number)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_shipping_tracking');
    await db.query('DROP TABLE IF EXISTS shipping CASCADE');
  },
};
