import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        email VARCHAR(255) UNIQUE NOT NULL,
        password_hash VARCHAR(255) NOT NULL,
        full_name VARCHAR(255) NOT NULL,
        phone VARCHAR(20),
        role VARCHAR(20) NOT NULL DEFAULT 'customer',
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    await db.query('CREATE INDEX idx_users_role ON users(role)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_users_role');
    await db.query('DROP TABLE IF EXISTS users CASCADE');
  },
};
