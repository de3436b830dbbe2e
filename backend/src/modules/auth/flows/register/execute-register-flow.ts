/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - Deep module for password registration.
 * - Keeps AuthService thin.
 *
 * FLOW:
 * 1) normalise email
 * 2) pre-check email, then username (409 with a field-specific message)
 * 3) hash password
 * 4) one atomic insert (unique indexes catch the concurrent-duplicate race → 409)
 * 5) issue EMAIL_VERIFY token (subject = email) and fire-and-forget the email
 *
 * RULES:
 * - Never log raw email, password or token.
 * - Email dispatch never fails the request.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenService } from '../../../../shared/security/token-service';
import type { Queue } from '../../../../shared/messaging/queue';

import { toPublicUser, UserConflictError } from '../../../users';
import type { PublicUser, User, UserRepository } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { AUTH_LINK_PATHS } from '../../auth.constants';
import type { AuthRequestMeta } from '../../auth.types';
import { buildEmailLink } from '../../helpers/build-email-link';
import { dispatchEmail } from '../../helpers/dispatch-email';
import { emailDomain, emailKey } from '../../helpers/email-pii';

export type RegisterParams = AuthRequestMeta & {
  username: string;
  email: string;
  password: string;
};

export async function executeRegisterFlow(
  deps: {
    userRepo: UserRepository;
    passwordHasher: PasswordHasher;
    tokens: TokenService;
    queue: Queue;
    logger: Logger;
    publicBaseUrl: string;
  },
  params: RegisterParams,
): Promise<PublicUser> {
  const email = params.email.toLowerCase();

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
    emailDomain: emailDomain(email),
    emailKey: emailKey(email),
  });

  if (await deps.userRepo.findByEmail(email)) {
    throw AuthErrors.emailTaken({ emailKey: emailKey(email) });
  }
  if (await deps.userRepo.findByUsername(params.username)) {
    throw AuthErrors.usernameTaken({ username: params.username });
  }

  const passwordHash = await deps.passwordHasher.hash(params.password);

  let user: User;
  try {
    user = await deps.userRepo.create({ username: params.username, email, passwordHash });
  } catch (err) {
    if (err instanceof UserConflictError) {
      throw err.field === 'email'
        ? AuthErrors.emailTaken({ emailKey: emailKey(email), race: true })
        : AuthErrors.usernameTaken({ username: params.username, race: true });
    }
    throw err;
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
    { requestId: params.requestId, flow: 'auth.register' },
  );

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
    userId: user.id,
  });

  return toPublicUser(user);
}
