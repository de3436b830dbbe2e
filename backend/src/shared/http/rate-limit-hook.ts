/**
 * backend/src/shared/http/rate-limit-hook.ts
 *
 * WHY:
 * - Rate limiting belongs at the HTTP boundary, before body validation and before
 *   any gated work (hashing, DB reads, token signing).
 * - Routes declare a route class; the identity comes from the request.
 *
 * HOW TO USE:
 * - app.post('/auth/login', { preHandler: rateLimit('auth.login') }, handler)
 *
 * IDENTITY:
 * - `user:{username}` when bearer auth resolved a user, otherwise `ip:{ip}`.
 * - Prefixed with the tenant key when the host carries one, so tenants never
 *   share a budget.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RateLimiter } from '../security/rate-limit';
import type { RouteClass } from '../security/rate-limit.policies';

export function rateLimitIdentity(req: FastifyRequest): string {
  const username = req.authContext?.username;
  const caller = username ? `user:${username}` : `ip:${req.ip}`;
  const tenantKey = req.requestContext?.tenantKey;

  return tenantKey ? `${tenantKey}:${caller}` : caller;
}

export type RateLimitHookFactory = (
  routeClass: RouteClass,
) => (req: FastifyRequest, reply: FastifyReply) => Promise<void>;

export function createRateLimitHook(limiter: RateLimiter): RateLimitHookFactory {
  return (routeClass) => async (req, reply) => {
    // Throws RateLimitError; error-handler turns it into 429 + Retry-After.
    const decision = await limiter.hitOrThrow(rateLimitIdentity(req), routeClass);

    reply.header('X-RateLimit-Limit', decision.limit);
    reply.header('X-RateLimit-Remaining', decision.remaining);
  };
}
