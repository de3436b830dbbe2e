/**
 * src/shared/security/token.errors.ts
 *
 * WHY:
 * - Callers must be able to tell why a token was rejected, even when the
 *   user-facing message collapses the reasons into one.
 * - `reason` is a discriminant so switch statements stay exhaustive.
 *
 * RULES:
 * - Never put the raw token into an error message or property.
 */

export type TokenErrorReason =
  | 'malformed'
  | 'invalid_signature'
  | 'expired'
  | 'purpose_mismatch'
  | 'revoked';

export abstract class TokenError extends Error {
  abstract readonly reason: TokenErrorReason;
}

export class TokenMalformedError extends TokenError {
  readonly reason = 'malformed';

  constructor(message = 'Token is not well-formed') {
    super(message);
    this.name = 'TokenMalformedError';
  }
}

export class TokenInvalidSignatureError extends TokenError {
  readonly reason = 'invalid_signature';

  constructor(message = 'Token signature is invalid') {
    super(message);
    this.name = 'TokenInvalidSignatureError';
  }
}

export class TokenExpiredError extends TokenError {
  readonly reason = 'expired';

  constructor(readonly expiredAt: Date) {
    super('Token has expired');
    this.name = 'TokenExpiredError';
  }
}

export class TokenPurposeMismatchError extends TokenError {
  readonly reason = 'purpose_mismatch';

  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Token purpose mismatch: expected ${expected}, got ${actual}`);
    this.name = 'TokenPurposeMismatchError';
  }
}

export class TokenRevokedError extends TokenError {
  readonly reason = 'revoked';

  constructor() {
    super('Token has been revoked');
    this.name = 'TokenRevokedError';
  }
}

/** Misuse of the token service itself (bad TTL, weak secret). Not a per-request condition. */
export class TokenConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenConfigError';
  }
}
