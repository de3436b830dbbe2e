/**
 * backend/src/app/routes.ts
 *
 * Route table of the service:
 * - GET /health (no auth, no rate limit; load balancer probe)
 * - every module that exposes HTTP routes, each handed the same rate-limit
 *   hook factory so route classes resolve against one limiter.
 *
 * Wiring only. Handlers live in the module controllers.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { createRateLimitHook } from '../shared/http/rate-limit-hook';
import type { RateLimitHookFactory } from '../shared/http/rate-limit-hook';

type HttpModule = {
  registerRoutes(app: FastifyInstance, rateLimit: RateLimitHookFactory): void;
};

export type HealthResponse = {
  ok: true;
  env: AppConfig['nodeEnv'];
  service: string;
  requestId: string;
  tenantKey: string | null;
};

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/health', (req: FastifyRequest): HealthResponse => ({
    ok: true,
    env: opts.config.nodeEnv,
    service: opts.config.serviceName,
    requestId: req.requestContext.requestId,
    tenantKey: req.requestContext.tenantKey,
  }));

  const rateLimit = createRateLimitHook(opts.deps.rateLimiter);
  const modules: readonly HttpModule[] = [opts.deps.auth, opts.deps.users];

  for (const mod of modules) mod.registerRoutes(app, rateLimit);
}
