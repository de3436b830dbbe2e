/**
 * backend/src/modules/auth/flows/email-verification/confirm-email-flow.ts
 *
 * WHY:
 * - Consumes an EMAIL_VERIFY token and marks the account verified.
 *
 * RULES:
 * - Idempotent: an already-verified account succeeds without a write.
 * - Any token failure (expired, tampered, wrong purpose, revoked) and a subject
 *   that no longer exists both answer 400 "Verification error", with no mutation.
 * - markVerified is one conditional UPDATE; a concurrent confirmation that loses
 *   the race reports "already verified".
 * - A revocation store that cannot answer is a 503, not a pass.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { TokenService } from '../../../../shared/security/token-service';
import { TokenError } from '../../../../shared/security/token.errors';

import type { UserRepository } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { AUTH_MESSAGES } from '../../auth.constants';
import type { AuthRequestMeta, MessageResult } from '../../auth.types';

export type ConfirmEmailParams = AuthRequestMeta & {
  token: string;
};

export async function confirmEmailFlow(
  deps: {
    userRepo: UserRepository;
    tokens: TokenService;
    logger: Logger;
  },
  params: ConfirmEmailParams,
): Promise<MessageResult> {
  const logBase = {
    flow: 'auth.confirm-email',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
  };

  let email: string;
  try {
    email = await deps.tokens.validate(params.token, 'EMAIL_VERIFY');
  } catch (err) {
    if (err instanceof TokenError) {
      deps.logger.warn({ msg: 'auth.confirm_email.rejected', ...logBase, reason: err.reason });
      throw AuthErrors.verificationFailed({ reason: err.reason });
    }
    throw err;
  }

  const user = await deps.userRepo.findByEmail(email);
  if (!user) {
    deps.logger.warn({ msg: 'auth.confirm_email.rejected', ...logBase, reason: 'user_not_found' });
    throw AuthErrors.verificationFailed({ reason: 'user_not_found' });
  }

  if (user.isVerified) {
    return { message: AUTH_MESSAGES.emailAlreadyVerified };
  }

  const changed = await deps.userRepo.markVerified(user.email);
  if (!changed) {
    return { message: AUTH_MESSAGES.emailAlreadyVerified };
  }

  deps.logger.info({ msg: 'auth.confirm_email.success', ...logBase, userId: user.id });

  return { message: AUTH_MESSAGES.emailVerified };
}
