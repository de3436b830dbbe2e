/**
 * src/shared/security/token-revocations.ts
 *
 * WHY:
 * - Tokens are stateless bearer tokens; without server-side state they stay valid
 *   until they expire, even after a password change.
 * - Two mechanisms, both stored in the Cache with a TTL so they clean themselves up:
 *   - Subject epoch: "tokens of purpose P for subject S issued before T are invalid".
 *     Used after password reset and role change.
 *   - Token id denylist: one specific token is invalid (logout), or has been used
 *     (consumeToken, for single-use reset tokens).
 *
 * RULES:
 * - Epochs have one-second granularity (JWT iat is in seconds). A token issued in
 *   the same second as the revocation survives it.
 * - Failures propagate as CacheUnavailableError. A revocation check that cannot
 *   be answered must not be treated as "not revoked".
 */

import type { Cache } from '../cache/cache';
import { withTimeout } from '../cache/with-timeout';
import type { TokenClaims, TokenPurpose } from './token.types';

const KEY_PREFIX = 'revoked';
const DEFAULT_TIMEOUT_MS = 200;

export class TokenRevocations {
  private readonly timeoutMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly cache: Cache,
    private readonly opts: {
      /** How long a subject epoch must be kept: the longest token TTL. */
      retentionSeconds: number;
      timeoutMs?: number;
      now?: () => number;
    },
  ) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.clock = opts.now ?? (() => Date.now());
  }

  private subjectKey(purpose: TokenPurpose, subject: string): string {
    return `${KEY_PREFIX}:sub:${purpose}:${subject}`;
  }

  private tokenKey(tokenId: string): string {
    return `${KEY_PREFIX}:jti:${tokenId}`;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }

  /** Invalidates every token of `purpose` for `subject` issued before now. */
  async revokeSubject(purpose: TokenPurpose, subject: string): Promise<void> {
    await withTimeout(
      this.cache.set(this.subjectKey(purpose, subject), String(this.nowSeconds()), {
        ttlSeconds: this.opts.retentionSeconds,
      }),
      this.timeoutMs,
    );
  }

  /** Invalidates one token. Kept only until the token would have expired anyway. */
  async revokeToken(claims: Pick<TokenClaims, 'tokenId' | 'expiresAt'>): Promise<void> {
    const remaining = claims.expiresAt - this.nowSeconds();
    if (remaining <= 0) return;

    await withTimeout(
      this.cache.set(this.tokenKey(claims.tokenId), '1', { ttlSeconds: remaining }),
      this.timeoutMs,
    );
  }

  /**
   * Single-use claim: atomically marks the token as used and reports whether this
   * caller was first. Two concurrent consumers of the same token cannot both win.
   */
  async consumeToken(claims: Pick<TokenClaims, 'tokenId' | 'expiresAt'>): Promise<boolean> {
    const remaining = claims.expiresAt - this.nowSeconds();
    if (remaining <= 0) return false;

    const counter = await withTimeout(
      this.cache.incr(this.tokenKey(claims.tokenId), { ttlSeconds: remaining }),
      this.timeoutMs,
    );

    return counter.value === 1;
  }

  async isRevoked(claims: TokenClaims): Promise<boolean> {
    const [denied, epoch] = await withTimeout(
      Promise.all([
        this.cache.get(this.tokenKey(claims.tokenId)),
        this.cache.get(this.subjectKey(claims.purpose, claims.subject)),
      ]),
      this.timeoutMs,
    );

    if (denied !== null) return true;
    if (epoch === null) return false;

    return claims.issuedAt < Number(epoch);
  }
}
