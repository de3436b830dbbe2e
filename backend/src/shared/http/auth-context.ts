/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and access are separate concepts.
 * - registerAuthContext() sets an unauthenticated stub on every request.
 * - registerBearerAuth() overwrites it when the request carries a valid ACCESS token.
 * - Controllers read req.authContext (through requireUser) to decide access.
 *
 * RULES:
 * - Best-effort: a missing, malformed, expired or revoked token leaves the stub in place.
 *   Endpoints decide whether authentication is required.
 * - A revocation store that cannot answer is NOT "not revoked": that error propagates (503).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Role } from '../../modules/users/user.types';
import type { CachedUserProjection } from '../session/session.types';
import type { TokenClaims } from '../security/token.types';
import { TokenError } from '../security/token.errors';

export type AuthContext = {
  userId: string | null;
  username: string | null;
  email: string | null;
  role: Role | null;
  isVerified: boolean;

  /** Claims of the presented ACCESS token (needed by logout). */
  token: Pick<TokenClaims, 'tokenId' | 'expiresAt'> | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export type BearerAuthenticator = (
  accessToken: string,
) => Promise<{ user: CachedUserProjection; claims: TokenClaims } | null>;

function unauthenticated(): AuthContext {
  return {
    userId: null,
    username: null,
    email: null,
    role: null,
    isVerified: false,
    token: null,
  };
}

function readBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const [scheme, value] = header.trim().split(/\s+/, 2);
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !value) return null;

  return value;
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = unauthenticated();
    done();
  });
}

export function registerBearerAuth(app: FastifyInstance, authenticate: BearerAuthenticator) {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const accessToken = readBearerToken(req.headers.authorization);
    if (!accessToken) return;

    let resolved: Awaited<ReturnType<BearerAuthenticator>>;
    try {
      resolved = await authenticate(accessToken);
    } catch (err) {
      // Invalid tokens are an expected condition: stay unauthenticated.
      if (err instanceof TokenError) return;
      throw err;
    }
    if (!resolved) return;

    req.authContext = {
      userId: resolved.user.id,
      username: resolved.user.username,
      email: resolved.user.email,
      role: resolved.user.role,
      isVerified: resolved.user.isVerified,
      token: { tokenId: resolved.claims.tokenId, expiresAt: resolved.claims.expiresAt },
    };
  });
}
