/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Admission control for network-facing routes, per caller identity and per route class
 *   (login attempts are limited harder than profile reads).
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, policies, { prefix: 'rl', timeoutMs: 200 })
 * - const decision = await limiter.admit('ip:1.2.3.4', 'auth.login')
 * - await limiter.hitOrThrow('ip:1.2.3.4', 'auth.login')  // throws RateLimitError
 *
 * POLICIES:
 * - fixed-window: `limit` requests per `windowSeconds`; the window starts on the first hit.
 * - token-bucket: bursts up to `capacity`, refilled at `refillPerSecond`.
 *
 * ATOMICITY:
 * - fixed-window uses INCR-then-check, not check-then-INCR. Two concurrent requests both
 *   increment; the one that pushes over the limit gets back a value > limit and is
 *   rejected. There is no TOCTOU race.
 * - token-bucket refills and takes in one atomic step (Lua script in Redis).
 *
 * AVAILABILITY:
 * - Every cache call is bounded by `timeoutMs`. A slow or unreachable cache surfaces as
 *   CacheUnavailableError (503 at the HTTP boundary); it never admits and never hangs.
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks.
 * - Never check NODE_ENV here; that decision belongs to the composition root.
 */

import type { Cache } from '../cache/cache';
import { withTimeout } from '../cache/with-timeout';
import type { RateLimitPolicies, RateLimitPolicy, RouteClass } from './rate-limit.policies';

const DEFAULT_TIMEOUT_MS = 200;

export type AdmissionDecision = {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until a denied caller may try again (0 when allowed). */
  retryAfterSeconds: number;
};

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly routeClass: RouteClass,
    public readonly limit: number,
    public readonly retryAfterSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly policies: RateLimitPolicies,
    private readonly opts?: { prefix?: string; disabled?: boolean; timeoutMs?: number },
  ) {}

  private get timeoutMs(): number {
    return this.opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private buildKey(routeClass: RouteClass, identityKey: string): string {
    const key = `${routeClass}:${identityKey}`;
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  policyFor(routeClass: RouteClass): RateLimitPolicy {
    return this.policies[routeClass];
  }

  async admit(identityKey: string, routeClass: RouteClass): Promise<AdmissionDecision> {
    const policy = this.policyFor(routeClass);

    if (this.opts?.disabled) {
      const limit = policy.kind === 'fixed-window' ? policy.limit : policy.capacity;
      return { allowed: true, limit, remaining: limit, retryAfterSeconds: 0 };
    }

    const key = this.buildKey(routeClass, identityKey);

    if (policy.kind === 'fixed-window') {
      const counter = await withTimeout(
        this.cache.incr(key, { ttlSeconds: policy.windowSeconds }),
        this.timeoutMs,
      );
      const allowed = counter.value <= policy.limit;

      // The window resets when the counter expires.
      const windowLeft = counter.ttlSeconds ?? policy.windowSeconds;

      return {
        allowed,
        limit: policy.limit,
        remaining: Math.max(0, policy.limit - counter.value),
        retryAfterSeconds: allowed ? 0 : Math.max(1, windowLeft),
      };
    }

    const bucket = await withTimeout(
      this.cache.takeToken(key, {
        capacity: policy.capacity,
        refillPerSecond: policy.refillPerSecond,
      }),
      this.timeoutMs,
    );

    return {
      allowed: bucket.allowed,
      limit: policy.capacity,
      remaining: Math.floor(bucket.tokens),
      retryAfterSeconds: bucket.allowed
        ? 0
        : Math.max(1, Math.ceil((1 - bucket.tokens) / policy.refillPerSecond)),
    };
  }

  /**
   * Admits or throws RateLimitError. Use at the HTTP boundary, before any gated work.
   */
  async hitOrThrow(identityKey: string, routeClass: RouteClass): Promise<AdmissionDecision> {
    const decision = await this.admit(identityKey, routeClass);

    if (!decision.allowed) {
      throw new RateLimitError(
        this.buildKey(routeClass, identityKey),
        routeClass,
        decision.limit,
        decision.retryAfterSeconds,
      );
    }

    return decision;
  }
}
