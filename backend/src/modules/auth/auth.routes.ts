/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Every route is rate limited before the controller runs.
 */

import type { FastifyInstance } from 'fastify';
import type { RateLimitHookFactory } from '../../shared/http/rate-limit-hook';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(
  app: FastifyInstance,
  controller: AuthController,
  rateLimit: RateLimitHookFactory,
) {
  app.post(
    '/auth/register',
    { preHandler: rateLimit('auth.register') },
    controller.register.bind(controller),
  );
  app.post('/auth/login', { preHandler: rateLimit('auth.login') }, controller.login.bind(controller));

  app.get(
    '/auth/confirmed_email/:token',
    { preHandler: rateLimit('auth.email') },
    controller.confirmEmail.bind(controller),
  );
  app.post(
    '/auth/request_email',
    { preHandler: rateLimit('auth.email') },
    controller.requestEmail.bind(controller),
  );

  app.post(
    '/auth/forgot-password',
    { preHandler: rateLimit('auth.password') },
    controller.forgotPassword.bind(controller),
  );
  app.post(
    '/auth/reset-password/:token',
    { preHandler: rateLimit('auth.password') },
    controller.resetPassword.bind(controller),
  );

  app.post(
    '/auth/logout',
    { preHandler: rateLimit('users.write') },
    controller.logout.bind(controller),
  );
}
