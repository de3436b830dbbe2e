import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { ErrorBodySchema, PublicUserSchema, seedUser } from '../helpers/auth-test-helpers';

describe('POST /auth/register', () => {
  it('creates an unverified USER and enqueues a verification email', async () => {
    const t = await buildTestApp();

    try {
      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        headers: { host: 'acme.localhost:3000' },
        payload: { username: 'alice', email: 'Alice@Example.com', password: 'pw123' },
      });

      expect(res.statusCode).toBe(201);

      const body = PublicUserSchema.parse(res.json());
      expect(body).toMatchObject({
        username: 'alice',
        email: 'alice@example.com',
        isVerified: false,
        role: 'USER',
        avatarUrl: null,
      });

      const stored = await t.userRepo.findByEmail('alice@example.com');
      expect(stored?.passwordHash).not.toBe('pw123');
      expect(await t.passwordHasher.verify('pw123', stored?.passwordHash ?? '')).toBe(true);

      const messages = t.queue.drainOfType('auth.verify-email');
      expect(messages).toHaveLength(1);

      const [msg] = messages;
      expect(msg).toMatchObject({
        userId: body.id,
        username: 'alice',
        email: 'alice@example.com',
        tenantKey: 'acme',
      });
      expect(msg?.link).toBe(
        `http://app.test/auth/confirmed_email/${encodeURIComponent(msg?.verifyToken ?? '')}`,
      );
      expect(await t.deps.tokens.validate(msg?.verifyToken ?? '', 'EMAIL_VERIFY')).toBe(
        'alice@example.com',
      );
    } finally {
      await t.close();
    }
  });

  it('returns 409 for a taken email, checked before the username', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'alice', email: 'ALICE@example.com', password: 'pw123' },
      });

      expect(res.statusCode).toBe(409);
      expect(ErrorBodySchema.parse(res.json()).error).toEqual({
        code: 'CONFLICT',
        message: 'A user with this email already exists.',
      });
      expect(t.userRepo.size()).toBe(1);
    } finally {
      await t.close();
    }
  });

  it('returns 409 for a taken username', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'alice', email: 'other@example.com', password: 'pw123' },
      });

      expect(res.statusCode).toBe(409);
      expect(ErrorBodySchema.parse(res.json()).error.message).toBe(
        'A user with this username already exists.',
      );
      expect(t.queue.drain()).toEqual([]);
    } finally {
      await t.close();
    }
  });

  it('lets exactly one of two concurrent registrations for the same email win', async () => {
    const t = await buildTestApp();

    try {
      const [a, b] = await Promise.all([
        t.app.inject({
          method: 'POST',
          url: '/auth/register',
          payload: { username: 'racer1', email: 'race@example.com', password: 'pw123' },
        }),
        t.app.inject({
          method: 'POST',
          url: '/auth/register',
          payload: { username: 'racer2', email: 'race@example.com', password: 'pw123' },
        }),
      ]);

      expect([a.statusCode, b.statusCode].sort()).toEqual([201, 409]);
      expect(t.userRepo.size()).toBe(1);
    } finally {
      await t.close();
    }
  });

  it('returns 400 for an invalid body', async () => {
    const t = await buildTestApp();

    try {
      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'al', email: 'not-an-email', password: 'pw' },
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(res.json()).error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
      });
      expect(t.userRepo.size()).toBe(0);
    } finally {
      await t.close();
    }
  });
});
