/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for rate limiting, token revocations and the
 *   cached user projection.
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 *
 * LOGGING:
 * - Redis connection errors fire outside any request context (they are client-level events,
 *   not request-level). We use the global logger directly.
 */

import { createClient } from 'redis';
import { bucketTtlSeconds, CacheUnavailableError } from './cache';
import type {
  Cache,
  CacheSetOptions,
  CounterResult,
  TokenBucketOptions,
  TokenBucketResult,
} from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

// KEYS[1] = bucket key
// ARGV = capacity, refillPerSecond, nowMs, ttlMs
// Returns { allowed (0|1), tokens (string, fractional) }
const TAKE_TOKEN_SCRIPT = `
local capacity = tonumber(ARGV[1])
local refill = tonumber(ARGV[2])
local now = tonumber(ARGV[3])
local ttl = tonumber(ARGV[4])
local state = redis.call('HMGET', KEYS[1], 'tokens', 'ts')
local tokens = tonumber(state[1])
local ts = tonumber(state[2])
if tokens == nil or ts == nil then
  tokens = capacity
  ts = now
end
local elapsed = math.max(0, now - ts) / 1000
tokens = math.min(capacity, tokens + elapsed * refill)
local allowed = 0
if tokens >= 1 then
  tokens = tokens - 1
  allowed = 1
end
redis.call('HSET', KEYS[1], 'tokens', tostring(tokens), 'ts', tostring(now))
redis.call('PEXPIRE', KEYS[1], ttl)
return { allowed, tostring(tokens) }
`;

function parseTakeTokenReply(reply: unknown): TokenBucketResult {
  if (!Array.isArray(reply) || reply.length !== 2) {
    throw new Error('redis.take_token: unexpected script reply');
  }

  const [allowed, tokens] = reply;
  return {
    allowed: Number(allowed) === 1,
    tokens: Number(tokens),
  };
}

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  /**
   * Creates the client without connecting. The composition root calls connect()
   * at startup and disconnect() at shutdown.
   */
  static create(redisUrl: string): RedisCache {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      // Connection-level error: no request context available.
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    return new RedisCache(client);
  }

  async connect(): Promise<void> {
    if (this.client.isOpen) return;
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    if (!this.client.isOpen) return;
    await this.client.quit();
  }

  private ensureReady(): void {
    if (!this.client.isReady) throw new CacheUnavailableError('Redis client is not ready');
  }

  async get(key: string): Promise<string | null> {
    this.ensureReady();
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.ensureReady();
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    this.ensureReady();
    await this.client.del(key);
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<CounterResult> {
    this.ensureReady();
    const value = await this.client.incr(key);
    const ttl = await this.client.ttl(key);

    // TTL -1: key has no expiry yet (first hit, or a lost EXPIRE).
    if (ttl < 0 && opts?.ttlSeconds) {
      await this.client.expire(key, opts.ttlSeconds);
      return { value, ttlSeconds: opts.ttlSeconds };
    }

    return { value, ttlSeconds: ttl < 0 ? null : ttl };
  }

  async takeToken(key: string, opts: TokenBucketOptions): Promise<TokenBucketResult> {
    this.ensureReady();
    const reply: unknown = await this.client.eval(TAKE_TOKEN_SCRIPT, {
      keys: [key],
      arguments: [
        String(opts.capacity),
        String(opts.refillPerSecond),
        String(Date.now()),
        String(bucketTtlSeconds(opts) * 1000),
      ],
    });

    return parseTakeTokenReply(reply);
  }
}
