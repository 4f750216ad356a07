import express from 'express';
import type { AppContext } from '../../context';
import type { AuthGuards } from '../../middlewares/auth.middleware';
import { createSignInRateLimiter } from '../../middlewares/rateLimit.middleware';
import { createAuthController } from './auth.controller';

export const createAuthRoutes = ({ services, repositories }: AppContext, { authenticate }: AuthGuards) => {
  const router = express.Router();
  const controller = createAuthController(services.auth, repositories.users);
  const signInLimit = createSignInRateLimiter();

  // Public routes
  router.post('/register', signInLimit, controller.register);
  router.post('/login', signInLimit, controller.login);

  // Protected routes
  router.get('/me', authenticate, controller.me);

  return router;
};
