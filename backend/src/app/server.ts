/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest, registration order):
 * 1) request context   (requestId + tenantKey from Host)
 * 2) auth context stub (unauthenticated)
 * 3) bearer auth       (ACCESS token → cached projection / repository)
 * 4) request log line
 * Route preHandlers (rate limits) run after all of these, so limits can key on the user.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { requestLogger } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext, registerBearerAuth } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

// Signed tokens travel as path params (/auth/reset-password/:token) and run ~300 chars.
const MAX_PARAM_LENGTH = 2048;

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    maxParamLength: MAX_PARAM_LENGTH,
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerBearerAuth(app, opts.deps.auth.authenticate);
  registerErrorHandler(app);

  app.addHook('onRequest', async (req) => {
    requestLogger(req).info('request', {
      method: req.method,
      // Tokens travel in paths; keep them out of the request line.
      route: req.routeOptions.url ?? req.url,
      host: req.requestContext.host,
    });
  });

  return app;
}
