import type { RequestHandler } from 'express';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  message: string;
}

interface RateLimitWindow {
  count: number;
  resetTime: number;
}

/**
 * Fixed-window limiter keyed by route and client IP.
 * Each limiter keeps its own counters, so two apps never share a budget.
 */
export const createRateLimiter = ({ windowMs, max, message }: RateLimitOptions): RequestHandler => {
  const windows = new Map<string, RateLimitWindow>();

  const dropExpired = (now: number) => {
    for (const [key, window] of windows) {
      if (window.resetTime <= now) {
        windows.delete(key);
      }
    }
  };

  return (req, res, next) => {
    const now = Date.now();
    const key = `${req.baseUrl}${req.path}:${req.ip ?? 'unknown'}`;

    let window = windows.get(key);
    if (!window || window.resetTime <= now) {
      dropExpired(now);
      window = { count: 0, resetTime: now + windowMs };
      windows.set(key, window);
    }
    window.count += 1;

    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - window.count)));
    res.setHeader('X-RateLimit-Reset', new Date(window.resetTime).toISOString());

    if (window.count > max) {
      const retryAfter = Math.ceil((window.resetTime - now) / 1000);
      logger.warn('[Rate Limit Exceeded]', { key, count: window.count, limit: max });
      res.setHeader('Retry-After', String(retryAfter));
      ResponseHandler.tooManyRequests(res, message, retryAfter);
      return;
    }

    next();
  };
};

/** Register and login share one budget per route and client. */
export const createSignInRateLimiter = (): RequestHandler =>
  createRateLimiter({
    ...appConfig.signInRateLimit,
    message: 'Too many sign-in attempts. Try again later.',
  });
