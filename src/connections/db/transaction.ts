import type { Pool, PoolClient } from 'pg';
import { logger } from '../../utils/logging';

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client.
 * Any error rolls the transaction back and is rethrown.
 */
export const withTransaction = async <T>(
  db: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> => {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
    throw error;
  } finally {
    client.release();
  }
};
