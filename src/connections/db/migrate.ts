import type { Pool } from 'pg';
import type { Queryable } from './queryable';
import type { MigrationInfo } from './migrations/types';
import { migrations as defaultMigrations } from './migrations';
import { withTransaction } from './transaction';
import { pool } from './connection';
import { logger } from '../../utils/logging';

const createMigrationsTable = async (db: Queryable) => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);
};

const getExecutedMigrations = async (db: Queryable): Promise<string[]> => {
  const result = await db.query<{ name: string }>('SELECT name FROM migrations ORDER BY id ASC');
  return result.rows.map(row => row.name);
};

/**
 * Apply every pending migration, each in its own transaction.
 * Returns the names of the migrations that ran.
 */
export const runMigrations = async (
  db: Pool,
  migrations: MigrationInfo[] = defaultMigrations
): Promise<string[]> => {
  await createMigrationsTable(db);
  const executed = new Set(await getExecutedMigrations(db));
  const applied: string[] = [];

  for (const { name, migration } of migrations) {
    if (executed.has(name)) {
      logger.debug(`Migration ${name} already executed, skipping`);
      continue;
    }

    await withTransaction(db, async client => {
      await migration.up(client);
      await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    });
    logger.info(`Migration ${name} executed successfully`);
    applied.push(name);
  }

  return applied;
};

/**
 * Roll back the most recently applied migration, if any.
 */
export const rollbackLastMigration = async (
  db: Pool,
  migrations: MigrationInfo[] = defaultMigrations
): Promise<string | undefined> => {
  await createMigrationsTable(db);
  const executed = await getExecutedMigrations(db);
  const lastName = executed[executed.length - 1];

  if (!lastName) {
    logger.info('No migrations to rollback');
    return undefined;
  }

  const info = migrations.find(m => m.name === lastName);
  if (!info) {
    throw new Error(`Migration ${lastName} not found in migrations list`);
  }

  await withTransaction(db, async client => {
    await info.migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [lastName]);
  });
  logger.info(`Migration ${lastName} rolled back successfully`);
  return lastName;
};

if (require.main === module) {
  const command = process.argv[2];
  const task: Promise<unknown> = command === 'rollback' ? rollbackLastMigration(pool) : runMigrations(pool);

  task
    .then(() => logger.info('Migration task completed'))
    .catch((error: unknown) => {
      logger.error('Migration task failed', { error: error instanceof Error ? error.stack : String(error) });
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
