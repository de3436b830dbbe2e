/**
 * src/shared/security/token-service.ts
 *
 * WHY:
 * - Issues and validates the signed, expiring tokens used for sessions (ACCESS),
 *   email confirmation (EMAIL_VERIFY) and password reset (PASSWORD_RESET).
 * - Standard JWT (HS256) so a token can be inspected with any JWT tool.
 *
 * HOW TO USE:
 * - const token = tokens.issue('EMAIL_VERIFY', user.email)
 * - const email = await tokens.validate(token, 'EMAIL_VERIFY')  // throws TokenError
 *
 * VALIDATION ORDER (LOCKED):
 * 1) structure       -> TokenMalformedError
 * 2) signature       -> TokenInvalidSignatureError (tampered, wrong key, wrong issuer)
 * 3) expiry          -> TokenExpiredError (now >= exp)
 * 4) claims shape    -> TokenMalformedError
 * 5) purpose         -> TokenPurposeMismatchError
 * 6) revocation      -> TokenRevokedError
 *
 * RULES:
 * - The clock is injectable; iat/exp are computed from it, and verification
 *   uses it as the reference time.
 * - Never log raw tokens.
 */

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

import {
  TokenConfigError,
  TokenExpiredError,
  TokenInvalidSignatureError,
  TokenMalformedError,
  TokenPurposeMismatchError,
  TokenRevokedError,
} from './token.errors';
import type { TokenRevocations } from './token-revocations';
import { TOKEN_PURPOSES } from './token.types';
import type { TokenClaims, TokenPurpose, TokenTtls } from './token.types';

const ALGORITHM = 'HS256';
export const MIN_SECRET_LENGTH = 32;

const claimsSchema = z.object({
  sub: z.string().min(1),
  purpose: z.enum(TOKEN_PURPOSES),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

export type TokenServiceOptions = {
  secret: string;
  issuer: string;
  ttlSeconds: TokenTtls;
  /** When set, validate() also rejects revoked tokens. */
  revocations?: TokenRevocations;
  /** Milliseconds since epoch. */
  now?: () => number;
};

export class TokenService {
  private readonly clock: () => number;

  constructor(private readonly opts: TokenServiceOptions) {
    if (opts.secret.length < MIN_SECRET_LENGTH) {
      throw new TokenConfigError(`Signing secret must be at least ${MIN_SECRET_LENGTH} characters`);
    }
    for (const purpose of TOKEN_PURPOSES) {
      assertValidTtl(opts.ttlSeconds[purpose]);
    }
    this.clock = opts.now ?? (() => Date.now());
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }

  ttlFor(purpose: TokenPurpose): number {
    return this.opts.ttlSeconds[purpose];
  }

  issue(
    purpose: TokenPurpose,
    subject: string,
    ttlSeconds: number = this.ttlFor(purpose),
  ): string {
    assertValidTtl(ttlSeconds);

    const iat = this.nowSeconds();

    return jwt.sign(
      { sub: subject, purpose, iat, exp: iat + ttlSeconds, jti: randomUUID() },
      this.opts.secret,
      { algorithm: ALGORITHM, issuer: this.opts.issuer },
    );
  }

  /**
   * Verifies structure, signature and expiry, and returns the claims.
   * Does NOT check purpose or revocation; use validate() on consumption paths.
   */
  decode(token: string): TokenClaims {
    if (!token || jwt.decode(token) === null) {
      throw new TokenMalformedError();
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.opts.secret, {
        algorithms: [ALGORITHM],
        issuer: this.opts.issuer,
        clockTimestamp: this.nowSeconds(),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError(err.expiredAt);
      }
      if (err instanceof jwt.JsonWebTokenError && err.message === 'jwt malformed') {
        throw new TokenMalformedError();
      }
      throw new TokenInvalidSignatureError();
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success || parsed.data.exp <= parsed.data.iat) {
      throw new TokenMalformedError('Token claims are not well-formed');
    }

    return {
      subject: parsed.data.sub,
      purpose: parsed.data.purpose,
      issuedAt: parsed.data.iat,
      expiresAt: parsed.data.exp,
      tokenId: parsed.data.jti,
    };
  }

  /**
   * Full validation for a consumption path. Returns the claims.
   */
  async validateClaims(token: string, expectedPurpose: TokenPurpose): Promise<TokenClaims> {
    const claims = this.decode(token);

    if (claims.purpose !== expectedPurpose) {
      throw new TokenPurposeMismatchError(expectedPurpose, claims.purpose);
    }

    if (this.opts.revocations && (await this.opts.revocations.isRevoked(claims))) {
      throw new TokenRevokedError();
    }

    return claims;
  }

  /**
   * Full validation for a consumption path. Returns the subject claim.
   */
  async validate(token: string, expectedPurpose: TokenPurpose): Promise<string> {
    const claims = await this.validateClaims(token, expectedPurpose);
    return claims.subject;
  }
}

function assertValidTtl(ttlSeconds: number): void {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new TokenConfigError(`Token TTL must be a positive integer, got ${ttlSeconds}`);
  }
}
