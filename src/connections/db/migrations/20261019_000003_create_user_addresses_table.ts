import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS user_addresses (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        line1 VARCHAR(255) NOT NULL,
        line2 VARCHAR(255),
        city VARCHAR(100) NOT NULL,
        postal_code VARCHAR(20) NOT NULL,
        country VARCHAR(100) NOT NULL,
        is_default BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    await db.query('CREATE INDEX idx_user_addresses_user ON user_addresses(user_id)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_user_addresses_user');
    await db.query('DROP TABLE IF EXISTS user_addresses CASCADE');
  },
};
