import { Pool } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';

export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  process.exit(-1);
});

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Verify the database is reachable, retrying while it starts up
 */
export const connectDatabase = async (
  db: Pool = pool,
  maxRetries: number = 10,
  retryDelay: number = 2000
): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await db.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      if (attempt === maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts`, { error: message });
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, { error: message });
      await sleep(retryDelay);
    }
  }
};
