/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Token failures collapse to one client message per endpoint; the precise
 *   reason (expired, revoked, purpose mismatch...) goes to meta and logs only.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login / resend / forgot-password: no account with that email. */
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('A user with this email already exists.', meta);
  },

  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('A user with this username already exists.', meta);
  },

  /** Login before the email was confirmed. */
  unverified(meta?: AppErrorMeta) {
    return new AppError({
      code: 'UNVERIFIED',
      status: 401,
      message: 'Email is not verified.',
      meta,
    });
  },

  /** Forgot-password on an unconfirmed account (policy: unverified accounts cannot reset). */
  unverifiedForReset(meta?: AppErrorMeta) {
    return new AppError({
      code: 'UNVERIFIED',
      status: 400,
      message: 'Email is not verified',
      meta,
    });
  },

  /** Login: wrong password. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  /** Email confirmation token rejected, or its subject no longer exists. */
  verificationFailed(meta?: AppErrorMeta) {
    return new AppError({
      code: 'INVALID_TOKEN',
      status: 400,
      message: 'Verification error',
      meta,
    });
  },

  /** Password reset token rejected (expired, tampered, wrong purpose, already used). */
  resetTokenInvalid(meta?: AppErrorMeta) {
    return new AppError({
      code: 'INVALID_TOKEN',
      status: 400,
      message: 'Invalid or expired token',
      meta,
    });
  },
};
