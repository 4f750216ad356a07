import express from 'express';
import cors from 'cors';
import type { AppContext } from './context';
import { corsOptions } from './connections/config/cors.config';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { logger } from './utils/logging';

export const createApp = (context: AppContext) => {
  const app = express();

  // Middleware
  app.use(cors(corsOptions));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await context.db.query('SELECT 1');
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('Health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  // API Routes
  app.use('/api', createRoutes(context));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
