/**
 * backend/src/modules/auth/flows/password-reset/reset-password-flow.ts
 *
 * WHY:
 * - Deep module for consuming a password reset token and setting a new password.
 *
 * FLOW:
 * 1) validate as PASSWORD_RESET           → 400 "Invalid or expired token"
 * 2) consume the token id (atomic claim)  → 400 if someone already used it
 * 3) user by the token's email claim      → 404
 * 4) revoke every other PASSWORD_RESET token for that email
 * 5) hash + single-statement password update
 * 6) revoke every ACCESS token of the user issued before now
 * 7) invalidate the cached projection
 *
 * RULES:
 * - The token is single-use, and an older reset link must not outlive a completed
 *   reset. Steps 2 and 4 happen BEFORE the write: when the revocation store is down
 *   we answer 503 and the password stays as it was.
 * - Steps 6-7 run after the write is durable; their failures are logged, not
 *   surfaced (the password did change).
 * - No auto-login after reset: the user proves the new password by signing in.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenService } from '../../../../shared/security/token-service';
import type { TokenRevocations } from '../../../../shared/security/token-revocations';
import { TokenError } from '../../../../shared/security/token.errors';
import type { TokenClaims } from '../../../../shared/security/token.types';
import type { SessionCache } from '../../../../shared/session/session-cache';

import type { UserRepository } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { AUTH_MESSAGES } from '../../auth.constants';
import type { AuthRequestMeta, MessageResult } from '../../auth.types';

export type ResetPasswordParams = AuthRequestMeta & {
  token: string;
  newPassword: string;
};

export async function resetPasswordFlow(
  deps: {
    userRepo: UserRepository;
    passwordHasher: PasswordHasher;
    tokens: TokenService;
    revocations: TokenRevocations;
    sessionCache: SessionCache;
    logger: Logger;
  },
  params: ResetPasswordParams,
): Promise<MessageResult> {
  const logBase = {
    flow: 'auth.reset-password',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
  };

  let claims: TokenClaims;
  try {
    claims = await deps.tokens.validateClaims(params.token, 'PASSWORD_RESET');
  } catch (err) {
    if (err instanceof TokenError) {
      deps.logger.warn({ msg: 'auth.reset_password.rejected', ...logBase, reason: err.reason });
      throw AuthErrors.resetTokenInvalid({ reason: err.reason });
    }
    throw err;
  }

  const firstUse = await deps.revocations.consumeToken(claims);
  if (!firstUse) {
    deps.logger.warn({ msg: 'auth.reset_password.rejected', ...logBase, reason: 'revoked' });
    throw AuthErrors.resetTokenInvalid({ reason: 'revoked' });
  }

  const user = await deps.userRepo.findByEmail(claims.subject);
  if (!user) throw AuthErrors.userNotFound();

  await deps.revocations.revokeSubject('PASSWORD_RESET', user.email);

  const passwordHash = await deps.passwordHasher.hash(params.newPassword);

  const updated = await deps.userRepo.updatePassword(user.email, passwordHash);
  if (!updated) throw AuthErrors.userNotFound({ userId: user.id });

  try {
    await deps.revocations.revokeSubject('ACCESS', user.username);
  } catch (err) {
    deps.logger.error({
      msg: 'auth.reset_password.revoke_failed',
      ...logBase,
      userId: user.id,
      message: err instanceof Error ? err.message : String(err),
    });
  }

  await deps.sessionCache.invalidate(user.username);

  deps.logger.info({ msg: 'auth.reset_password.completed', ...logBase, userId: user.id });

  return { message: AUTH_MESSAGES.passwordChanged };
}
