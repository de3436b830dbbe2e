/**
 * backend/src/modules/auth/flows/email-verification/request-verification-email-flow.ts
 *
 * WHY:
 * - Re-sends the confirmation link (first email lost, or its token expired).
 *
 * RULES:
 * - Unknown email → 404 (same contract as login).
 * - Already verified → 200 with no token issued.
 * - Dispatch is fire-and-forget.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { TokenService } from '../../../../shared/security/token-service';
import type { Queue } from '../../../../shared/messaging/queue';

import type { UserRepository } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { AUTH_LINK_PATHS, AUTH_MESSAGES } from '../../auth.constants';
import type { AuthRequestMeta, MessageResult } from '../../auth.types';
import { buildEmailLink } from '../../helpers/build-email-link';
import { dispatchEmail } from '../../helpers/dispatch-email';
import { emailDomain, emailKey } from '../../helpers/email-pii';

export type RequestVerificationEmailParams = AuthRequestMeta & {
  email: string;
};

export async function requestVerificationEmailFlow(
  deps: {
    userRepo: UserRepository;
    tokens: TokenService;
    queue: Queue;
    logger: Logger;
    publicBaseUrl: string;
  },
  params: RequestVerificationEmailParams,
): Promise<MessageResult> {
  const email = params.email.toLowerCase();

  const user = await deps.userRepo.findByEmail(email);
  if (!user) {
    throw AuthErrors.userNotFound({ emailDomain: emailDomain(email), emailKey: emailKey(email) });
  }

  if (user.isVerified) {
    return { message: AUTH_MESSAGES.emailAlreadyVerified };
  }

  const verifyToken = deps.tokens.issue('EMAIL_VERIFY', user.email);

  dispatchEmail(
    deps,
    {
      type: 'auth.verify-email',
      userId: user.id,
      username: user.username,
      email: user.email,
      verifyToken,
      link: buildEmailLink(deps.publicBaseUrl, AUTH_LINK_PATHS.confirmEmail, verifyToken),
      tenantKey: params.tenantKey,
    },
    { requestId: params.requestId, flow: 'auth.request-email' },
  );

  deps.logger.info({
    msg: 'auth.request_email.sent',
    flow: 'auth.request-email',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
    userId: user.id,
  });

  return { message: AUTH_MESSAGES.verificationSent };
}
