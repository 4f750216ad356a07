import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  jwtSecret: process.env.JWT_SECRET || 'secret',
  // seconds
  jwtExpiresIn: parseInt(process.env.JWT_EXPIRES_IN || '604800', 10),
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
  bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '10', 10),
  signInRateLimit: {
    windowMs: parseInt(process.env.SIGN_IN_RATE_WINDOW_MS || '900000', 10),
    max: parseInt(process.env.SIGN_IN_RATE_MAX || '5', 10),
  },
};

export const loggingConfig = {
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  dir: process.env.LOG_DIR || './logs',
  toFile: process.env.LOG_TO_FILE ? process.env.LOG_TO_FILE === 'true' : appConfig.nodeEnv !== 'test',
  silent: appConfig.nodeEnv === 'test',
};
