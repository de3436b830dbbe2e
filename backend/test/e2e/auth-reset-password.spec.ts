import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import type { TestApp } from '../helpers/build-test-app';
import { CacheUnavailableError } from '../../src/shared/cache/cache';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import {
  ErrorBodySchema,
  MessageBodySchema,
  bearer,
  loginAs,
  seedUser,
} from '../helpers/auth-test-helpers';

async function requestResetToken(t: TestApp, email: string): Promise<string> {
  const res = await t.app.inject({
    method: 'POST',
    url: '/auth/forgot-password',
    payload: { email },
  });
  expect(res.statusCode).toBe(200);

  const [msg] = t.queue.drainOfType('auth.reset-password-email');
  return msg?.resetToken ?? '';
}

/** Reads and counters work; writes fail as if Redis dropped the command. */
class ReadOnlyCache extends InMemCache {
  override async set(): Promise<void> {
    throw new CacheUnavailableError('set refused');
  }
}

describe('POST /auth/reset-password/:token', () => {
  it('sets the new password, revokes older sessions and drops the cache entry', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const oldAccess = await loginAs(t, 'alice@example.com', 'pw123');
      const resetToken = await requestResetToken(t, 'alice@example.com');

      // Revocation epochs have one-second granularity.
      t.clock.advanceSeconds(1);

      const res = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'new-pw-456' },
      });

      expect(res.statusCode).toBe(200);
      expect(MessageBodySchema.parse(res.json()).message).toBe('Password successfully changed');
      expect(await t.cache.get('user:alice')).toBeNull();

      const stale = await t.app.inject({
        method: 'GET',
        url: '/users/me',
        headers: bearer(oldAccess),
      });
      expect(stale.statusCode).toBe(401);

      const oldPassword = await t.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'alice@example.com', password: 'pw123' },
      });
      expect(oldPassword.statusCode).toBe(401);

      const newAccess = await loginAs(t, 'alice@example.com', 'new-pw-456');
      const fresh = await t.app.inject({
        method: 'GET',
        url: '/users/me',
        headers: bearer(newAccess),
      });
      expect(fresh.statusCode).toBe(200);
    } finally {
      await t.close();
    }
  });

  it('accepts a reset token only once', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const resetToken = await requestResetToken(t, 'alice@example.com');

      const first = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'new-pw-456' },
      });
      expect(first.statusCode).toBe(200);

      const replay = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'attacker-pw' },
      });

      expect(replay.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(replay.json()).error).toEqual({
        code: 'INVALID_TOKEN',
        message: 'Invalid or expired token',
      });

      await loginAs(t, 'alice@example.com', 'new-pw-456');
    } finally {
      await t.close();
    }
  });

  it('returns 400 for an expired token and keeps the old password', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const resetToken = await requestResetToken(t, 'alice@example.com');

      t.clock.advanceSeconds(t.config.jwt.ttlSeconds.PASSWORD_RESET);

      const res = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'new-pw-456' },
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(res.json()).error.message).toBe('Invalid or expired token');

      await loginAs(t, 'alice@example.com', 'pw123');
    } finally {
      await t.close();
    }
  });

  it('rejects malformed tokens and tokens of another purpose', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const verifyToken = t.deps.tokens.issue('EMAIL_VERIFY', 'alice@example.com');

      for (const token of ['not-a-token', verifyToken]) {
        const res = await t.app.inject({
          method: 'POST',
          url: `/auth/reset-password/${token}`,
          payload: { newPassword: 'new-pw-456' },
        });

        expect(res.statusCode).toBe(400);
        expect(ErrorBodySchema.parse(res.json()).error.code).toBe('INVALID_TOKEN');
      }
    } finally {
      await t.close();
    }
  });

  it('returns 404 when the account behind the token is gone', async () => {
    const t = await buildTestApp();

    try {
      const token = t.deps.tokens.issue('PASSWORD_RESET', 'ghost@example.com');

      const res = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${token}`,
        payload: { newPassword: 'new-pw-456' },
      });

      expect(res.statusCode).toBe(404);
      expect(ErrorBodySchema.parse(res.json()).error.message).toBe('User not found');
    } finally {
      await t.close();
    }
  });

  it('returns 400 for a too-short new password', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const resetToken = await requestResetToken(t, 'alice@example.com');

      const res = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'x' },
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(res.json()).error.code).toBe('VALIDATION_ERROR');

      // The token was not consumed by the rejected request.
      const retry = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'new-pw-456' },
      });
      expect(retry.statusCode).toBe(200);
    } finally {
      await t.close();
    }
  });

  it('answers 503 and changes nothing while the revocation store is down', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const resetToken = await requestResetToken(t, 'alice@example.com');

      await t.cache.disconnect();

      const res = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'new-pw-456' },
      });

      expect(res.statusCode).toBe(503);
      expect(ErrorBodySchema.parse(res.json()).error.code).toBe('DEPENDENCY_UNAVAILABLE');

      const stored = await t.userRepo.findByEmail('alice@example.com');
      expect(await t.passwordHasher.verify('pw123', stored?.passwordHash ?? '')).toBe(true);
    } finally {
      await t.close();
    }
  });

  it('routes a full-length signed token through the path parameter', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const resetToken = await requestResetToken(t, 'alice@example.com');
      expect(resetToken.length).toBeGreaterThan(100);

      const res = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'new-pw-456' },
      });

      expect(res.statusCode).toBe(200);
    } finally {
      await t.close();
    }
  });

  it('invalidates older reset links once a reset completes', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const olderLink = await requestResetToken(t, 'alice@example.com');
      t.clock.advanceSeconds(5);
      const newerLink = await requestResetToken(t, 'alice@example.com');

      const reset = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${newerLink}`,
        payload: { newPassword: 'new-pw-456' },
      });
      expect(reset.statusCode).toBe(200);

      t.clock.advanceSeconds(5);

      const stale = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${olderLink}`,
        payload: { newPassword: 'other-pw-789' },
      });

      expect(stale.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(stale.json()).error).toEqual({
        code: 'INVALID_TOKEN',
        message: 'Invalid or expired token',
      });

      const other = await t.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'alice@example.com', password: 'other-pw-789' },
      });
      expect(other.statusCode).toBe(401);

      await loginAs(t, 'alice@example.com', 'new-pw-456');
    } finally {
      await t.close();
    }
  });

  it('answers 503 and keeps the password when older links cannot be revoked', async () => {
    const t = await buildTestApp({}, { makeCache: (now) => new ReadOnlyCache({ now }) });

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const resetToken = await requestResetToken(t, 'alice@example.com');

      const res = await t.app.inject({
        method: 'POST',
        url: `/auth/reset-password/${resetToken}`,
        payload: { newPassword: 'new-pw-456' },
      });

      expect(res.statusCode).toBe(503);
      expect(ErrorBodySchema.parse(res.json()).error.code).toBe('DEPENDENCY_UNAVAILABLE');

      const stored = await t.userRepo.findByEmail('alice@example.com');
      expect(await t.passwordHasher.verify('pw123', stored?.passwordHash ?? '')).toBe(true);
    } finally {
      await t.close();
    }
  });
});
