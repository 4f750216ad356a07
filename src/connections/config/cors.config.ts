import type { CorsOptions } from 'cors';
import { ForbiddenError } from '../../utils/errors';
import { appConfig } from './app.config';

export interface CorsSettings {
  nodeEnv: string;
  frontendUrl: string;
  corsOrigins: string[];
}

const developmentOrigins = ['http://localhost:3000', 'http://localhost:5173'];

/**
 * FRONTEND_URL and CORS_ORIGINS are always allowed. Development also accepts
 * the local dev servers, or any origin while CORS_ORIGINS is empty.
 */
export const isOriginAllowed = (origin: string, settings: CorsSettings = appConfig): boolean => {
  if (origin === settings.frontendUrl || settings.corsOrigins.includes(origin)) {
    return true;
  }
  if (settings.nodeEnv !== 'development') {
    return false;
  }
  return settings.corsOrigins.length === 0 || developmentOrigins.includes(origin);
};

export const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Requests without an Origin header are not cross-origin browser calls
    if (!origin || isOriginAllowed(origin)) {
      callback(null, true);
      return;
    }
    callback(new ForbiddenError(`Origin ${origin} is not allowed`));
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After'],
  maxAge: 86400,
};
