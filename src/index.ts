import { createApp } from './app';
import { createContext } from './context';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, pool, runMigrations } from './connections/db';
import { logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Connect, migrate and start the HTTP server
 */
const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    const applied = await runMigrations(pool);
    logger.info(`Migrations applied: ${applied.length}`);

    const app = createApp(createContext(pool));
    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error: unknown) {
    logger.error('Failed to start server:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

void startServer();
