import { describe, it, expect, afterEach } from 'vitest';
import express from 'express';
import { isOriginAllowed } from '../connections/config/cors.config';
import { errorHandler } from '../middlewares/error.middleware';
import { createRateLimiter } from '../middlewares/rateLimit.middleware';
import { listen } from './helpers/http';
import type { ListeningApp } from './helpers/http';

describe('middlewares', () => {
  let running: ListeningApp | undefined;

  afterEach(async () => {
    await running?.close();
    running = undefined;
  });

  describe('createRateLimiter', () => {
    it('should answer 429 once a route exceeds its budget', async () => {
      const app = express();
      const limit = createRateLimiter({ windowMs: 60000, max: 2, message: 'Slow down' });
      app.post('/login', limit, (_req, res) => {
        res.json({ ok: true });
      });
      app.post('/register', limit, (_req, res) => {
        res.json({ ok: true });
      });
      running = await listen(app);

      const first = await fetch(`${running.origin}/login`, { method: 'POST' });
      const second = await fetch(`${running.origin}/login`, { method: 'POST' });
      const third = await fetch(`${running.origin}/login`, { method: 'POST' });
      const otherRoute = await fetch(`${running.origin}/register`, { method: 'POST' });

      expect([first.status, second.status, third.status]).toEqual([200, 200, 429]);
      expect(first.headers.get('x-ratelimit-remaining')).toBe('1');
      expect(third.headers.get('x-ratelimit-remaining')).toBe('0');
      expect(third.headers.get('retry-after')).toBe('60');
      expect(await third.json()).toEqual({
        success: false,
        message: 'Slow down',
        error: { code: 'TOO_MANY_REQUESTS', details: { retryAfter: 60 } },
      });
      expect(otherRoute.status).toBe(200);
    });

    it('should keep separate counters per limiter', async () => {
      const app = express();
      app.get('/a', createRateLimiter({ windowMs: 60000, max: 1, message: 'Slow down' }), (_req, res) => {
        res.json({ ok: true });
      });
      running = await listen(app);
      const fresh = express();
      fresh.get('/a', createRateLimiter({ windowMs: 60000, max: 1, message: 'Slow down' }), (_req, res) => {
        res.json({ ok: true });
      });
      const other = await listen(fresh);

      try {
        expect((await fetch(`${running.origin}/a`)).status).toBe(200);
        expect((await fetch(`${running.origin}/a`)).status).toBe(429);
        expect((await fetch(`${other.origin}/a`)).status).toBe(200);
      } finally {
        await other.close();
      }
    });
  });

  describe('errorHandler', () => {
    const failingWith = (code: string) => {
      const app = express();
      app.get('/fail', () => {
        throw Object.assign(new Error('driver error'), { code });
      });
      app.use(errorHandler);
      return app;
    };

    it('should map out-of-range and malformed numeric values to 400', async () => {
      for (const code of ['22003', '22P02']) {
        running = await listen(failingWith(code));

        const response = await fetch(`${running.origin}/fail`);

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
          success: false,
          message: 'Value does not fit its column',
          error: { code: 'VALIDATION_ERROR' },
        });
        await running.close();
        running = undefined;
      }
    });

    it('should map a unique violation to 400 and a foreign key violation to 404', async () => {
      running = await listen(failingWith('23505'));
      const duplicate = await fetch(`${running.origin}/fail`);
      await running.close();

      running = await listen(failingWith('23503'));
      const dangling = await fetch(`${running.origin}/fail`);

      expect(duplicate.status).toBe(400);
      expect(dangling.status).toBe(404);
      expect(await dangling.json()).toEqual({
        success: false,
        message: 'Referenced record does not exist',
        error: { code: 'NOT_FOUND' },
      });
    });
  });

  describe('isOriginAllowed', () => {
    const production = { nodeEnv: 'production', frontendUrl: 'https://shop.example', corsOrigins: ['https://admin.example'] };

    it('should allow only the configured origins outside development', () => {
      expect(isOriginAllowed('https://shop.example', production)).toBe(true);
      expect(isOriginAllowed('https://admin.example', production)).toBe(true);
      expect(isOriginAllowed('http://localhost:5173', production)).toBe(false);
      expect(isOriginAllowed('https://elsewhere.example', production)).toBe(false);
    });

    it('should open development up to local servers, or to everyone without CORS_ORIGINS', () => {
      const development = { ...production, nodeEnv: 'development' };

      expect(isOriginAllowed('http://localhost:3000', development)).toBe(true);
      expect(isOriginAllowed('https://elsewhere.example', development)).toBe(false);
      expect(isOriginAllowed('https://elsewhere.example', { ...development, corsOrigins: [] })).toBe(true);
    });
  });
});
