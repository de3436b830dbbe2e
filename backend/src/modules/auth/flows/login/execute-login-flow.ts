/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin.
 *
 * FLOW:
 * 1) user by email            → 404 "User not found"
 * 2) email confirmed?         → 401 UNVERIFIED
 * 3) password                 → 401 "Invalid email or password."
 * 4) issue ACCESS token (subject = username)
 * 5) best-effort cache fill   (a cache outage never fails a login)
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - A failed login never touches the cached projection.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenService } from '../../../../shared/security/token-service';
import type { SessionCache } from '../../../../shared/session/session-cache';

import type { UserRepository } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import type { AccessTokenResult, AuthRequestMeta } from '../../auth.types';
import { emailDomain, emailKey } from '../../helpers/email-pii';
import { toUserProjection } from '../../helpers/to-user-projection';
import { assertLoginAccountAllowed } from '../../policies/login-account-gating.policy';

export type LoginParams = AuthRequestMeta & {
  email: string;
  password: string;
};

export async function executeLoginFlow(
  deps: {
    userRepo: UserRepository;
    passwordHasher: PasswordHasher;
    tokens: TokenService;
    sessionCache: SessionCache;
    logger: Logger;
  },
  params: LoginParams,
): Promise<AccessTokenResult> {
  const email = params.email.toLowerCase();
  const logBase = {
    flow: 'auth.login',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
    emailDomain: emailDomain(email),
    emailKey: emailKey(email),
  };

  const user = await deps.userRepo.findByEmail(email);

  assertLoginAccountAllowed(user, (failure) => {
    deps.logger.warn({ msg: 'auth.login.rejected', ...logBase, reason: failure.reason });
  });

  const passwordOk = await deps.passwordHasher.verify(params.password, user.passwordHash);
  if (!passwordOk) {
    deps.logger.warn({
      msg: 'auth.login.rejected',
      ...logBase,
      userId: user.id,
      reason: 'bad_password',
    });
    throw AuthErrors.invalidCredentials();
  }

  const accessToken = deps.tokens.issue('ACCESS', user.username);

  const cached = await deps.sessionCache.set(user.username, toUserProjection(user));

  deps.logger.info({
    msg: 'auth.login.success',
    ...logBase,
    userId: user.id,
    role: user.role,
    cached,
  });

  return { accessToken, tokenType: 'bearer' };
}
