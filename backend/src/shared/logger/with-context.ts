/**
 * backend/src/shared/logger/with-context.ts
 *
 * Request-scoped child logger. Every line it writes carries the request id, the
 * tenant key from the Host header, and who is calling (username plus the jti of
 * the ACCESS token, so a revoked token can be traced through the logs).
 *
 *   requestLogger(req).warn('rate_limit', { routeClass })
 *
 * Call it after the request-context and auth hooks have run; before that the
 * fields are null.
 */

import type { FastifyRequest } from 'fastify';

import { logger } from './logger';
import type { Logger } from './logger';

export function requestLogger(req: FastifyRequest): Logger {
  return logger.child({
    requestId: req.requestContext?.requestId ?? null,
    tenantKey: req.requestContext?.tenantKey ?? null,
    username: req.authContext?.username ?? null,
    tokenId: req.authContext?.token?.tokenId ?? null,
  });
}
