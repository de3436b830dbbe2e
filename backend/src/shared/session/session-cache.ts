/**
 * src/shared/session/session-cache.ts
 *
 * WHY:
 * - Avoids a repository read on every authenticated request by caching a small
 *   projection of the user, keyed by username.
 * - The cache is advisory: every read path has a repository fallback.
 *
 * RULES:
 * - A slow or broken cache degrades speed, never correctness. Timeouts, store
 *   errors and corrupted entries are logged and treated as a miss (reads) or a
 *   no-op (writes). Nothing here throws to the caller.
 * - set() always overwrites (last write wins); there is no merge.
 * - Lifecycle (connect/disconnect) belongs to the underlying Cache, which is
 *   shared with the rate limiter and token revocations; di.ts owns it.
 */

import type { Cache } from '../cache/cache';
import { withTimeout } from '../cache/with-timeout';
import { logger } from '../logger/logger';
import {
  cachedUserProjectionSchema,
  DEFAULT_USER_CACHE_TTL_SECONDS,
  USER_CACHE_KEY_PREFIX,
} from './session.types';
import type { CachedUserProjection } from './session.types';

export type SessionCacheOptions = {
  ttlSeconds?: number;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 200;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SessionCache {
  private readonly ttlSeconds: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly cache: Cache,
    opts: SessionCacheOptions = {},
  ) {
    this.ttlSeconds = opts.ttlSeconds ?? DEFAULT_USER_CACHE_TTL_SECONDS;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private key(username: string): string {
    return `${USER_CACHE_KEY_PREFIX}:${username}`;
  }

  /**
   * Writes the projection. Returns false if the write did not land.
   */
  async set(
    username: string,
    projection: CachedUserProjection,
    ttlSeconds: number = this.ttlSeconds,
  ): Promise<boolean> {
    try {
      await withTimeout(
        this.cache.set(this.key(username), JSON.stringify(projection), { ttlSeconds }),
        this.timeoutMs,
      );
      return true;
    } catch (err) {
      logger.warn('session_cache.set_failed', {
        flow: 'session-cache',
        userId: projection.id,
        message: errorMessage(err),
      });
      return false;
    }
  }

  /**
   * Returns the cached projection, or null on miss / timeout / outage / corrupt entry.
   */
  async get(username: string): Promise<CachedUserProjection | null> {
    let raw: string | null;
    try {
      raw = await withTimeout(this.cache.get(this.key(username)), this.timeoutMs);
    } catch (err) {
      logger.warn('session_cache.get_failed', {
        flow: 'session-cache',
        message: errorMessage(err),
      });
      return null;
    }

    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }

    const parsed = cachedUserProjectionSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('session_cache.corrupt_entry', { flow: 'session-cache' });
      await this.invalidate(username);
      return null;
    }

    return parsed.data;
  }

  /**
   * Drops the cached projection (password reset, role change, logout).
   * Returns false if the delete did not land; the entry then lives until its TTL.
   */
  async invalidate(username: string): Promise<boolean> {
    try {
      await withTimeout(this.cache.del(this.key(username)), this.timeoutMs);
      return true;
    } catch (err) {
      logger.warn('session_cache.invalidate_failed', {
        flow: 'session-cache',
        message: errorMessage(err),
      });
      return false;
    }
  }

  /**
   * Read-through: cache hit, else load from the repository and refill best-effort.
   */
  async resolve(
    username: string,
    load: () => Promise<CachedUserProjection | null>,
  ): Promise<CachedUserProjection | null> {
    const cached = await this.get(username);
    if (cached) return cached;

    const fresh = await load();
    if (fresh) await this.set(username, fresh);

    return fresh;
  }
}
