import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      BCRYPT_ROUNDS: '4',
      FRONTEND_URL: 'http://localhost:5173',
      CORS_ORIGINS: '',
    },
  },
});
