import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS categories (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) UNIQUE NOT NULL,
        description TEXT,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP TABLE IF EXISTS categories CASCADE');
  },
};
