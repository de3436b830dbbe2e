/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 * - Auth module owns register + login + email confirmation + password reset + logout
 *   routes, and the bearer authenticator the HTTP layer uses for every request.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { BearerAuthenticator } from '../../shared/http/auth-context';
import type { RateLimitHookFactory } from '../../shared/http/rate-limit-hook';

import { AuthService } from './auth.service';
import type { AuthServiceDeps } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: AuthServiceDeps) {
  const authService = new AuthService(deps);
  const controller = new AuthController(authService);

  const authenticate: BearerAuthenticator = (accessToken) =>
    authService.authenticateAccessToken(accessToken);

  return {
    authService,
    authenticate,
    registerRoutes(app: FastifyInstance, rateLimit: RateLimitHookFactory) {
      registerAuthRoutes(app, controller, rateLimit);
    },
  };
}
