import { describe, it, expect, vi } from 'vitest';

import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import type { Cache } from '../../../../src/shared/cache/cache';
import { SessionCache } from '../../../../src/shared/session/session-cache';
import type { CachedUserProjection } from '../../../../src/shared/session/session.types';
import { TestClock } from '../../../helpers/test-clock';

const alice: CachedUserProjection = {
  id: '1',
  username: 'alice',
  email: 'alice@example.com',
  isVerified: true,
  role: 'USER',
};

function setup(opts: { ttlSeconds?: number } = {}) {
  const clock = new TestClock();
  const cache = new InMemCache({ now: clock.now });
  const sessions = new SessionCache(cache, { ttlSeconds: opts.ttlSeconds ?? 3600, timeoutMs: 50 });
  return { clock, cache, sessions };
}

describe('SessionCache', () => {
  it('stores the projection as JSON under user:{username} until the TTL', async () => {
    const { clock, cache, sessions } = setup({ ttlSeconds: 60 });

    expect(await sessions.set('alice', alice)).toBe(true);
    expect(JSON.parse((await cache.get('user:alice')) ?? 'null')).toEqual(alice);
    expect(await sessions.get('alice')).toEqual(alice);

    clock.advanceSeconds(60);
    expect(await sessions.get('alice')).toBeNull();
  });

  it('last write wins', async () => {
    const { sessions } = setup();

    await sessions.set('alice', alice);
    await sessions.set('alice', { ...alice, role: 'ADMIN' });

    expect(await sessions.get('alice')).toEqual({ ...alice, role: 'ADMIN' });
  });

  it('invalidate() removes the entry', async () => {
    const { sessions } = setup();
    await sessions.set('alice', alice);

    expect(await sessions.invalidate('alice')).toBe(true);
    expect(await sessions.get('alice')).toBeNull();
  });

  it('treats a corrupt entry as a miss and drops it', async () => {
    const { cache, sessions } = setup();

    await cache.set('user:alice', '{not json');
    expect(await sessions.get('alice')).toBeNull();

    await cache.set('user:alice', JSON.stringify({ ...alice, role: 'ROOT' }));
    expect(await sessions.get('alice')).toBeNull();
    expect(await cache.get('user:alice')).toBeNull();
  });

  it('never throws during an outage: reads miss, writes report false', async () => {
    const { cache, sessions } = setup();
    await sessions.set('alice', alice);
    await cache.disconnect();

    await expect(sessions.get('alice')).resolves.toBeNull();
    await expect(sessions.set('alice', alice)).resolves.toBe(false);
    await expect(sessions.invalidate('alice')).resolves.toBe(false);
  });

  it('treats a hung cache as a miss after the timeout', async () => {
    const hung = new Promise<never>(() => {});
    const cache: Cache = {
      connect: () => Promise.resolve(),
      disconnect: () => Promise.resolve(),
      get: () => hung,
      set: () => hung,
      del: () => hung,
      incr: () => hung,
      takeToken: () => hung,
    };
    const sessions = new SessionCache(cache, { timeoutMs: 10 });

    await expect(sessions.get('alice')).resolves.toBeNull();
    await expect(sessions.set('alice', alice)).resolves.toBe(false);
  });

  describe('resolve()', () => {
    it('serves a hit without calling the loader', async () => {
      const { sessions } = setup();
      await sessions.set('alice', alice);
      const load = vi.fn(async () => null);

      expect(await sessions.resolve('alice', load)).toEqual(alice);
      expect(load).not.toHaveBeenCalled();
    });

    it('loads on a miss and refills the cache', async () => {
      const { sessions } = setup();
      const load = vi.fn(async () => alice);

      expect(await sessions.resolve('alice', load)).toEqual(alice);
      expect(await sessions.get('alice')).toEqual(alice);
      expect(load).toHaveBeenCalledTimes(1);
    });

    it('falls back to the loader during an outage', async () => {
      const { cache, sessions } = setup();
      await cache.disconnect();

      expect(await sessions.resolve('alice', async () => alice)).toEqual(alice);
    });

    it('returns null and caches nothing when the loader finds no user', async () => {
      const { cache, sessions } = setup();

      expect(await sessions.resolve('ghost', async () => null)).toBeNull();
      expect(await cache.get('user:ghost')).toBeNull();
    });
  });
});
