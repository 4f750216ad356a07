import { describe, it, expect } from 'vitest';
import { runMigrations } from '../connections/db/migrate';
import { migrations } from '../connections/db/migrations';
import { createMemoryPool } from './helpers/db';

describe('runMigrations', () => {
  it('should apply every migration once, in order', async () => {
    const pool = createMemoryPool();

    const first = await runMigrations(pool);
    const second = await runMigrations(pool);

    expect(first).toEqual(migrations.map(m => m.name));
    expect(first).toHaveLength(15);
    expect(second).toEqual([]);

    const recorded = await pool.query<{ name: string }>('SELECT name FROM migrations ORDER BY id ASC');
    expect(recorded.rows.map(row => row.name)).toEqual(first);
  });

  it('should create a table for every entity', async () => {
    const pool = createMemoryPool();
    await runMigrations(pool);

    const tables = [
      'users',
      'admins',
      'user_addresses',
      'categories',
      'products',
      'inventory',
      'orders',
      'order_items',
      'payments',
      'shipping',
      'carts',
      'cart_items',
      'reviews',
      'coupons',
      'wishlist',
      'audit_logs',
    ];
    for (const table of tables) {
      const result = await pool.query(`SELECT * FROM ${table}`);
      expect(result.rows).toEqual([]);
    }
  });
});
