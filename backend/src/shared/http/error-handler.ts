/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - RateLimitError → 429 + Retry-After.
 * - TokenError escaping a flow → 400 INVALID_TOKEN (reason only in logs).
 * - CacheUnavailableError → 503 (a dependency we fail closed on, e.g. revocations).
 * - Zod / Fastify validation errors → 400 (safety net if controller misses).
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 * - Log through requestLogger(req) so requestId, tenantKey, username and the
 *   token jti ride along on every line.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { TokenError } from '../security/token.errors';
import { CacheUnavailableError } from '../cache/cache';
import { requestLogger } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'resetToken',
  'verifyToken',
  'password',
  'newPassword',
  'passwordHash',
  'secret',
  'authorization',
]);

function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isFastifyClientError(err: Error): err is FastifyError {
  return 'statusCode' in err && typeof err.statusCode === 'number' && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = requestLogger(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        routeClass: err.routeClass,
        limit: err.limit,
        retryAfterSeconds: err.retryAfterSeconds,
      });

      return reply
        .status(429)
        .header('Retry-After', String(err.retryAfterSeconds))
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Token rejected outside a flow that maps it
    if (err instanceof TokenError) {
      log.warn('token_rejected', { flow: 'http.error', reason: err.reason });
      return reply.status(400).send(buildResponse('INVALID_TOKEN', 'Invalid or expired token'));
    }

    // 4) Dependency we cannot degrade around
    if (err instanceof CacheUnavailableError) {
      log.error('dependency_unavailable', {
        flow: 'http.error',
        dependency: 'cache',
        message: err.message,
      });

      return reply
        .status(503)
        .send(buildResponse('DEPENDENCY_UNAVAILABLE', 'Service temporarily unavailable'));
    }

    // 5) Validation safety net
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 6) Fastify's own 4xx (malformed JSON, body too large, unsupported media type)
    if (isFastifyClientError(err)) {
      log.warn('client_error', { flow: 'http.error', status: err.statusCode, code: err.code });
      return reply
        .status(err.statusCode ?? 400)
        .send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 7) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
