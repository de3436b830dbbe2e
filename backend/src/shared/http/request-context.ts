/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Each tenant reaches the service on its own subdomain (acme.example.com).
 *   Users are global; the tenant key partitions rate-limit budgets and tags logs.
 * - Every request gets a requestId for log correlation.
 *
 * HOW TO USE:
 * - registerRequestContext(app) once in app/server.ts, before any other hook.
 * - Read `req.requestContext` anywhere after that.
 *
 * RULES:
 * - tenantKey is null for localhost, an apex domain, an IP literal, or a first
 *   label that is not a valid DNS label. Null is a normal value, not an error.
 */

import type { FastifyInstance } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
  tenantKey: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const DNS_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;
const IPV4 = /^\d{1,3}(?:\.\d{1,3}){3}$/;

/** Lower-cased hostname without port, or null when there is nothing usable. */
export function hostnameOf(rawHost: string | undefined): string | null {
  const host = rawHost?.trim().toLowerCase().replace(/:\d+$/, '');
  return host ? host : null;
}

/**
 * acme.localhost → acme, acme.example.com → acme.
 * localhost, example.com, 10.0.0.1 → null.
 */
export function tenantKeyFromHost(host: string | null): string | null {
  if (!host || IPV4.test(host)) return null;

  const labels = host.split('.');
  const isLocal = labels[labels.length - 1] === 'localhost';
  const minLabels = isLocal ? 2 : 3;
  if (labels.length < minLabels) return null;

  const candidate = labels[0] ?? '';
  return DNS_LABEL.test(candidate) ? candidate : null;
}

export function registerRequestContext(app: FastifyInstance): void {
  // Fastify needs the property declared up front; onRequest fills it in.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  app.addHook('onRequest', async (req) => {
    const host = hostnameOf(req.headers.host);

    req.requestContext = {
      requestId: randomUUID(),
      host,
      tenantKey: tenantKeyFromHost(host),
    };
  });
}
