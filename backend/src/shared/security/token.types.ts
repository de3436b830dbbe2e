/**
 * src/shared/security/token.types.ts
 *
 * One signed-claims format (JWT, HS256) serves three purposes. The `purpose`
 * claim is what keeps a password-reset token from being replayed as a session
 * token, so every consumer validates it.
 */

export const TOKEN_PURPOSES = ['ACCESS', 'EMAIL_VERIFY', 'PASSWORD_RESET'] as const;

export type TokenPurpose = (typeof TOKEN_PURPOSES)[number];

export type TokenClaims = {
  /** Username for ACCESS; email for EMAIL_VERIFY and PASSWORD_RESET. */
  subject: string;
  purpose: TokenPurpose;
  /** Seconds since epoch. */
  issuedAt: number;
  /** Seconds since epoch; always > issuedAt. */
  expiresAt: number;
  tokenId: string;
};

export type TokenTtls = Record<TokenPurpose, number>;
