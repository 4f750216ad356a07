import type { PoolConfig } from 'pg';
import './app.config';

const buildDbConfig = (): PoolConfig => {
  const max = parseInt(process.env.DB_MAX_POOL || '10', 10);

  if (process.env.DATABASE_URL) {
    return { connectionString: process.env.DATABASE_URL, max };
  }

  return {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'storefront',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  };
};

export const dbConfig = buildDbConfig();
