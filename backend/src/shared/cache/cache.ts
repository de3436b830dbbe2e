/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate limiting, token revocations and the user projection cache are short-lived
 *   state that must be fast and externalized.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - await cache.connect() at startup, await cache.disconnect() at shutdown
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.incr(key, { ttlSeconds }) -> { value, ttlSeconds } counter with expiration
 * - cache.takeToken(key, { capacity, refillPerSecond }) -> token bucket
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export type CounterResult = {
  value: number;
  /** Seconds left before the counter expires; null when it has no TTL. */
  ttlSeconds: number | null;
};

export type TokenBucketOptions = {
  capacity: number;
  refillPerSecond: number;
};

export type TokenBucketResult = {
  allowed: boolean;
  /** Tokens left after this take (fractional while refilling). */
  tokens: number;
};

/**
 * Thrown by implementations when the backing store is unreachable.
 * Callers decide whether to absorb it (user cache) or surface it (rate limits).
 */
export class CacheUnavailableError extends Error {
  constructor(message = 'Cache unavailable', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheUnavailableError';
  }
}

export interface Cache {
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value and the TTL left on the key.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<CounterResult>;

  /**
   * Atomically refill and take one token from the bucket at `key`.
   * A missing bucket starts full.
   */
  takeToken(key: string, opts: TokenBucketOptions): Promise<TokenBucketResult>;
}

/** Time for an empty bucket to refill completely; used as the bucket key TTL. */
export function bucketTtlSeconds(opts: TokenBucketOptions): number {
  return Math.max(1, Math.ceil(opts.capacity / opts.refillPerSecond));
}
