import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  ErrorBodySchema,
  PublicUserSchema,
  bearer,
  loginAs,
  seedUser,
} from '../helpers/auth-test-helpers';

describe('GET /users/me', () => {
  it('returns the caller without secrets', async () => {
    const t = await buildTestApp();

    try {
      const user = await seedUser(t, {
        username: 'alice',
        email: 'alice@example.com',
        password: 'pw123',
      });
      const token = await loginAs(t, 'alice@example.com', 'pw123');

      const res = await t.app.inject({ method: 'GET', url: '/users/me', headers: bearer(token) });

      expect(res.statusCode).toBe(200);
      expect(PublicUserSchema.parse(res.json())).toEqual({
        id: user.id,
        username: 'alice',
        email: 'alice@example.com',
        isVerified: true,
        role: 'USER',
        avatarUrl: null,
        createdAt: user.createdAt.toISOString(),
      });
    } finally {
      await t.close();
    }
  });

  it('falls back to the repository when the cache entry is gone', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const token = await loginAs(t, 'alice@example.com', 'pw123');
      await t.cache.del('user:alice');

      const res = await t.app.inject({ method: 'GET', url: '/users/me', headers: bearer(token) });

      expect(res.statusCode).toBe(200);
      expect(await t.cache.get('user:alice')).not.toBeNull();
    } finally {
      await t.close();
    }
  });

  it('returns 401 for missing, malformed and expired tokens', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const token = await loginAs(t, 'alice@example.com', 'pw123');
      t.clock.advanceSeconds(t.config.jwt.ttlSeconds.ACCESS);

      for (const headers of [{}, bearer('garbage'), bearer(token)]) {
        const res = await t.app.inject({ method: 'GET', url: '/users/me', headers });

        expect(res.statusCode).toBe(401);
        expect(ErrorBodySchema.parse(res.json()).error.message).toBe(
          'Could not validate credentials',
        );
      }
    } finally {
      await t.close();
    }
  });

  it('rejects a reset token presented as a bearer token', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const resetToken = t.deps.tokens.issue('PASSWORD_RESET', 'alice');

      const res = await t.app.inject({
        method: 'GET',
        url: '/users/me',
        headers: bearer(resetToken),
      });

      expect(res.statusCode).toBe(401);
    } finally {
      await t.close();
    }
  });
});

describe('PATCH /users/avatar', () => {
  it('is forbidden for USER', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });
      const token = await loginAs(t, 'alice@example.com', 'pw123');

      const res = await t.app.inject({
        method: 'PATCH',
        url: '/users/avatar',
        headers: bearer(token),
        payload: { avatarUrl: 'https://img.test/alice.png' },
      });

      expect(res.statusCode).toBe(403);
      expect(ErrorBodySchema.parse(res.json()).error).toEqual({
        code: 'FORBIDDEN',
        message: 'Insufficient role.',
      });
    } finally {
      await t.close();
    }
  });

  it('updates the avatar for ADMIN', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, {
        username: 'root',
        email: 'root@example.com',
        password: 'pw123',
        role: 'ADMIN',
      });
      const token = await loginAs(t, 'root@example.com', 'pw123');

      const res = await t.app.inject({
        method: 'PATCH',
        url: '/users/avatar',
        headers: bearer(token),
        payload: { avatarUrl: 'https://img.test/root.png' },
      });

      expect(res.statusCode).toBe(200);
      expect(PublicUserSchema.parse(res.json()).avatarUrl).toBe('https://img.test/root.png');

      const invalid = await t.app.inject({
        method: 'PATCH',
        url: '/users/avatar',
        headers: bearer(token),
        payload: { avatarUrl: 'not a url' },
      });
      expect(invalid.statusCode).toBe(400);
    } finally {
      await t.close();
    }
  });
});

describe('PATCH /users/:username/role', () => {
  it('changes the role, drops the cached projection and revokes older tokens', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, {
        username: 'root',
        email: 'root@example.com',
        password: 'pw123',
        role: 'ADMIN',
      });
      await seedUser(t, { username: 'bob', email: 'bob@example.com', password: 'pw123' });

      const adminToken = await loginAs(t, 'root@example.com', 'pw123');
      const bobToken = await loginAs(t, 'bob@example.com', 'pw123');
      expect(await t.cache.get('user:bob')).not.toBeNull();

      t.clock.advanceSeconds(1);

      const res = await t.app.inject({
        method: 'PATCH',
        url: '/users/bob/role',
        headers: bearer(adminToken),
        payload: { role: 'ADMIN' },
      });

      expect(res.statusCode).toBe(200);
      expect(PublicUserSchema.parse(res.json())).toMatchObject({ username: 'bob', role: 'ADMIN' });
      expect(await t.cache.get('user:bob')).toBeNull();

      const stale = await t.app.inject({
        method: 'GET',
        url: '/users/me',
        headers: bearer(bobToken),
      });
      expect(stale.statusCode).toBe(401);

      const promoted = await loginAs(t, 'bob@example.com', 'pw123');
      const me = await t.app.inject({ method: 'GET', url: '/users/me', headers: bearer(promoted) });
      expect(PublicUserSchema.parse(me.json()).role).toBe('ADMIN');
    } finally {
      await t.close();
    }
  });

  it('is forbidden for USER and 404s for unknown targets', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, {
        username: 'root',
        email: 'root@example.com',
        password: 'pw123',
        role: 'ADMIN',
      });
      await seedUser(t, { username: 'bob', email: 'bob@example.com', password: 'pw123' });

      const bobToken = await loginAs(t, 'bob@example.com', 'pw123');
      const forbidden = await t.app.inject({
        method: 'PATCH',
        url: '/users/root/role',
        headers: bearer(bobToken),
        payload: { role: 'USER' },
      });
      expect(forbidden.statusCode).toBe(403);

      const adminToken = await loginAs(t, 'root@example.com', 'pw123');
      const missing = await t.app.inject({
        method: 'PATCH',
        url: '/users/ghost/role',
        headers: bearer(adminToken),
        payload: { role: 'ADMIN' },
      });
      expect(missing.statusCode).toBe(404);

      const badRole = await t.app.inject({
        method: 'PATCH',
        url: '/users/bob/role',
        headers: bearer(adminToken),
        payload: { role: 'ROOT' },
      });
      expect(badRole.statusCode).toBe(400);
    } finally {
      await t.close();
    }
  });
});
