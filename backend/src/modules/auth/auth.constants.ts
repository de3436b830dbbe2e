/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth response messages shared by flows and tests.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_MESSAGES = {
  emailVerified: 'Email successfully verified.',
  emailAlreadyVerified: 'Your email is already verified.',
  verificationSent: 'Check your email for verification instructions.',
  resetSent: 'Check your email for password reset instructions',
  passwordChanged: 'Password successfully changed',
  loggedOut: 'Logged out.',
} as const;

export const AUTH_LINK_PATHS = {
  confirmEmail: '/auth/confirmed_email',
  resetPassword: '/auth/reset-password',
} as const;
