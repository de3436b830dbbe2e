/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Every route is rate limited before the controller runs.
 */

import type { FastifyInstance } from 'fastify';
import type { RateLimitHookFactory } from '../../shared/http/rate-limit-hook';
import type { UserController } from './user.controller';

export function registerUserRoutes(
  app: FastifyInstance,
  controller: UserController,
  rateLimit: RateLimitHookFactory,
) {
  app.get('/users/me', { preHandler: rateLimit('users.read') }, controller.me.bind(controller));
  app.patch(
    '/users/avatar',
    { preHandler: rateLimit('users.write') },
    controller.updateAvatar.bind(controller),
  );
  app.patch(
    '/users/:username/role',
    { preHandler: rateLimit('users.write') },
    controller.changeRole.bind(controller),
  );
}
