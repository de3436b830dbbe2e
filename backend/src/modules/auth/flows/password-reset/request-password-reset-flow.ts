/**
 * backend/src/modules/auth/flows/password-reset/request-password-reset-flow.ts
 *
 * WHY:
 * - Deep module for the password-reset request use-case.
 * - Keeps AuthService thin.
 *
 * RULES:
 * - Unknown email → 404; unverified account → 400 (unverified accounts cannot reset).
 * - The token carries the email, not the username: a reset must survive a
 *   concurrent username change.
 * - Delivery is fire-and-forget; a failed dispatch is logged and does not roll
 *   back issuance (tokens are stateless, nothing to roll back).
 * - Anything unexpected while issuing → 500 INTERNAL.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { TokenService } from '../../../../shared/security/token-service';
import type { Queue } from '../../../../shared/messaging/queue';
import { AppError } from '../../../../shared/http/errors';

import type { UserRepository } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { AUTH_LINK_PATHS, AUTH_MESSAGES } from '../../auth.constants';
import type { AuthRequestMeta, MessageResult } from '../../auth.types';
import { buildEmailLink } from '../../helpers/build-email-link';
import { dispatchEmail } from '../../helpers/dispatch-email';
import { emailDomain, emailKey } from '../../helpers/email-pii';

export type RequestPasswordResetParams = AuthRequestMeta & {
  email: string;
};

export async function requestPasswordResetFlow(
  deps: {
    userRepo: UserRepository;
    tokens: TokenService;
    queue: Queue;
    logger: Logger;
    publicBaseUrl: string;
  },
  params: RequestPasswordResetParams,
): Promise<MessageResult> {
  const email = params.email.toLowerCase();
  const logBase = {
    flow: 'auth.forgot-password',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
    emailDomain: emailDomain(email),
    emailKey: emailKey(email),
  };

  deps.logger.info({ msg: 'auth.forgot_password.start', ...logBase });

  const user = await deps.userRepo.findByEmail(email);
  if (!user) throw AuthErrors.userNotFound({ emailKey: logBase.emailKey });

  if (!user.isVerified) {
    deps.logger.warn({ msg: 'auth.forgot_password.rejected', ...logBase, reason: 'unverified' });
    throw AuthErrors.unverifiedForReset({ userId: user.id });
  }

  let resetToken: string;
  try {
    resetToken = deps.tokens.issue('PASSWORD_RESET', user.email);
  } catch (err) {
    deps.logger.error({
      msg: 'auth.forgot_password.failed',
      ...logBase,
      userId: user.id,
      message: err instanceof Error ? err.message : String(err),
    });
    throw AppError.internal('Internal Server Error');
  }

  dispatchEmail(
    deps,
    {
      type: 'auth.reset-password-email',
      userId: user.id,
      username: user.username,
      email: user.email,
      resetToken,
      link: buildEmailLink(deps.publicBaseUrl, AUTH_LINK_PATHS.resetPassword, resetToken),
      tenantKey: params.tenantKey,
    },
    { requestId: params.requestId, flow: 'auth.forgot-password' },
  );

  deps.logger.info({ msg: 'auth.forgot_password.sent', ...logBase, userId: user.id });

  return { message: AUTH_MESSAGES.resetSent };
}
