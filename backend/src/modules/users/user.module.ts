/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Owns the /users routes; auth consumes its repository.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { SessionCache } from '../../shared/session/session-cache';
import type { TokenRevocations } from '../../shared/security/token-revocations';
import type { RateLimitHookFactory } from '../../shared/http/rate-limit-hook';

import type { UserRepository } from './user.repository';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  userRepo: UserRepository;
  sessionCache: SessionCache;
  revocations: TokenRevocations;
  logger: Logger;
}) {
  const userService = new UserService(deps);
  const controller = new UserController(userService);

  return {
    userService,
    registerRoutes(app: FastifyInstance, rateLimit: RateLimitHookFactory) {
      registerUserRoutes(app, controller, rateLimit);
    },
  };
}
