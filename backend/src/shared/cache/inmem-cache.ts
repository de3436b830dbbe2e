/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev if Redis is down) to run without external infra.
 * - Used primarily for unit/service tests.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache({ now: () => clock.now })  // deterministic TTLs
 *
 * NOTES:
 * - Every operation runs synchronously before its promise resolves, so incr and
 *   takeToken are atomic with respect to concurrent callers.
 * - disconnect() makes every call reject with CacheUnavailableError, which is how
 *   tests simulate a cache outage.
 */

import { bucketTtlSeconds, CacheUnavailableError } from './cache';
import type {
  Cache,
  CacheSetOptions,
  CounterResult,
  TokenBucketOptions,
  TokenBucketResult,
} from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };
type BucketEntry = { tokens: number; updatedAtMs: number; expiresAtMs: number };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly buckets = new Map<string, BucketEntry>();
  private readonly clock: () => number;
  private connected = true;

  constructor(opts?: { now?: () => number }) {
    this.clock = opts?.now ?? (() => Date.now());
  }

  private now(): number {
    return this.clock();
  }

  private ensureConnected(): void {
    if (!this.connected) throw new CacheUnavailableError('InMemCache is disconnected');
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  connect(): Promise<void> {
    this.connected = true;
    return Promise.resolve();
  }

  disconnect(): Promise<void> {
    this.connected = false;
    return Promise.resolve();
  }

  async get(key: string): Promise<string | null> {
    this.ensureConnected();
    const entry = this.getEntry(key);
    return entry ? entry.value : null;
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.ensureConnected();
    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
  }

  async del(key: string): Promise<void> {
    this.ensureConnected();
    this.store.delete(key);
    this.buckets.delete(key);
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<CounterResult> {
    this.ensureConnected();
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Same as the Redis implementation: TTL is only set when the counter has none.
    const expiresAtMs =
      entry?.expiresAtMs ?? (opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null);

    this.store.set(key, { value: String(next), expiresAtMs });

    return {
      value: next,
      ttlSeconds: expiresAtMs === null ? null : Math.ceil((expiresAtMs - this.now()) / 1000),
    };
  }

  async takeToken(key: string, opts: TokenBucketOptions): Promise<TokenBucketResult> {
    this.ensureConnected();
    const now = this.now();

    let bucket = this.buckets.get(key);
    if (!bucket || bucket.expiresAtMs <= now) {
      bucket = { tokens: opts.capacity, updatedAtMs: now, expiresAtMs: now };
    }

    const elapsedSeconds = Math.max(0, now - bucket.updatedAtMs) / 1000;
    let tokens = Math.min(opts.capacity, bucket.tokens + elapsedSeconds * opts.refillPerSecond);

    const allowed = tokens >= 1;
    if (allowed) tokens -= 1;

    this.buckets.set(key, {
      tokens,
      updatedAtMs: now,
      expiresAtMs: now + bucketTtlSeconds(opts) * 1000,
    });

    return { allowed, tokens };
  }
}
