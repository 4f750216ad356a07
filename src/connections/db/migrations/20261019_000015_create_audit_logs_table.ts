import type { Queryable } from '../queryable';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    // metadata is JSON encoded text
    await db.query(`
      CREATE TABLE IF NOT EXISTS audit_logs (
        id SERIAL PRIMARY KEY,
        actor_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        action VARCHAR(20) NOT NULL,
        entity_type VARCHAR(50) NOT NULL,
        entity_id INTEGER,
        metadata TEXT NOT NULL DEFAULT '{}',
        created_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    await db.query('CREATE INDEX idx_audit_logs_entity ON audit_logs(entity_type, entity_id)');
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_audit_logs_entity');
    await db.query('DROP TABLE IF EXISTS audit_logs CASCADE');
  },
};
