/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require authenticated user" logic.
 * - Authorization is one capability predicate over the closed Role enumeration,
 *   consulted here at the boundary.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or caches.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { Role } from '../../modules/users/user.types';
import { hasCapability } from '../../modules/users/policies/user-capability.policy';
import type { Capability } from '../../modules/users/policies/user-capability.policy';
import type { TokenClaims } from '../security/token.types';

export type RequiredAuthContext = Readonly<{
  userId: string;
  username: string;
  email: string;
  role: Role;
  token: Pick<TokenClaims, 'tokenId' | 'expiresAt'>;
}>;

export type RequireUserOptions = Readonly<{
  capability?: Capability;
}>;

/**
 * Controller guard: requires a valid ACCESS token, and optionally a capability.
 *
 * Guard sequence (LOCKED):
 * 1) no authenticated user -> 401 "Could not validate credentials"
 * 2) missing capability     -> 403 "Insufficient role."
 */
export function requireUser(
  req: FastifyRequest,
  opts: RequireUserOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized('Could not validate credentials');

  if (!ctx.userId || !ctx.username || !ctx.email || !ctx.role || !ctx.token) {
    throw AppError.unauthorized('Could not validate credentials');
  }

  if (opts.capability && !hasCapability(ctx.role, opts.capability)) {
    throw AppError.forbidden('Insufficient role.', { capability: opts.capability });
  }

  return {
    userId: ctx.userId,
    username: ctx.username,
    email: ctx.email,
    role: ctx.role,
    token: ctx.token,
  };
}
