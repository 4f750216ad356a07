import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    // One admin profile per user
    await db.query(`
      CREATE TABLE IF NOT EXISTS admins (
        id SERIAL PRIMARY KEY,
        user_id INTEGER UNIQUE NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        access_level VARCHAR(20) NOT NULL DEFAULT 'staff',
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP TABLE IF EXISTS admins CASCADE');
  },
};
