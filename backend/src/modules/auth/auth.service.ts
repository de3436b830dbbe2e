/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Single entry point of the Auth module: registration, login, email confirmation,
 *   verification resend, password reset (request + execute), logout, and the
 *   bearer-token resolution used by every authenticated route.
 * - Each use case lives in flows/; this class only holds the dependencies.
 *
 * RULES:
 * - Rate limiting happens at the HTTP boundary (preHandler), before any of this runs.
 * - Never store/log raw passwords or tokens.
 * - Cache writes are best-effort; revocation reads fail closed.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenService } from '../../shared/security/token-service';
import type { TokenRevocations } from '../../shared/security/token-revocations';
import type { TokenClaims } from '../../shared/security/token.types';
import type { SessionCache } from '../../shared/session/session-cache';
import type { CachedUserProjection } from '../../shared/session/session.types';
import type { Queue } from '../../shared/messaging/queue';

import type { PublicUser, UserRepository } from '../users';

import type { AccessTokenResult, MessageResult } from './auth.types';
import { toUserProjection } from './helpers/to-user-projection';

import { executeRegisterFlow } from './flows/register/execute-register-flow';
import type { RegisterParams } from './flows/register/execute-register-flow';
import { executeLoginFlow } from './flows/login/execute-login-flow';
import type { LoginParams } from './flows/login/execute-login-flow';
import { confirmEmailFlow } from './flows/email-verification/confirm-email-flow';
import type { ConfirmEmailParams } from './flows/email-verification/confirm-email-flow';
import { requestVerificationEmailFlow } from './flows/email-verification/request-verification-email-flow';
import type { RequestVerificationEmailParams } from './flows/email-verification/request-verification-email-flow';
import { requestPasswordResetFlow } from './flows/password-reset/request-password-reset-flow';
import type { RequestPasswordResetParams } from './flows/password-reset/request-password-reset-flow';
import { resetPasswordFlow } from './flows/password-reset/reset-password-flow';
import type { ResetPasswordParams } from './flows/password-reset/reset-password-flow';
import { logoutFlow } from './flows/logout/logout-flow';
import type { LogoutParams } from './flows/logout/logout-flow';

export type AuthServiceDeps = {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  tokens: TokenService;
  revocations: TokenRevocations;
  sessionCache: SessionCache;
  queue: Queue;
  logger: Logger;
  /** Origin used in email links, e.g. https://app.example.com */
  publicBaseUrl: string;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  register(params: RegisterParams): Promise<PublicUser> {
    return executeRegisterFlow(this.deps, params);
  }

  login(params: LoginParams): Promise<AccessTokenResult> {
    return executeLoginFlow(this.deps, params);
  }

  confirmEmail(params: ConfirmEmailParams): Promise<MessageResult> {
    return confirmEmailFlow(this.deps, params);
  }

  requestVerificationEmail(params: RequestVerificationEmailParams): Promise<MessageResult> {
    return requestVerificationEmailFlow(this.deps, params);
  }

  requestPasswordReset(params: RequestPasswordResetParams): Promise<MessageResult> {
    return requestPasswordResetFlow(this.deps, params);
  }

  resetPassword(params: ResetPasswordParams): Promise<MessageResult> {
    return resetPasswordFlow(this.deps, params);
  }

  logout(params: LogoutParams): Promise<MessageResult> {
    return logoutFlow(this.deps, params);
  }

  /**
   * Resolves a presented ACCESS token to the caller.
   * - Throws TokenError when the token is invalid (caller treats as unauthenticated).
   * - Throws CacheUnavailableError when revocation cannot be checked (→ 503).
   * - Returns null when the subject no longer exists.
   *
   * The projection comes from the Session Cache, falling back to the repository.
   */
  async authenticateAccessToken(
    accessToken: string,
  ): Promise<{ user: CachedUserProjection; claims: TokenClaims } | null> {
    const claims = await this.deps.tokens.validateClaims(accessToken, 'ACCESS');

    const user = await this.deps.sessionCache.resolve(claims.subject, async () => {
      const found = await this.deps.userRepo.findByUsername(claims.subject);
      return found ? toUserProjection(found) : null;
    });

    if (!user) return null;
    return { user, claims };
  }
}
