import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { ErrorBodySchema, MessageBodySchema, seedUser } from '../helpers/auth-test-helpers';

describe('GET /auth/confirmed_email/:token', () => {
  it('verifies the account once, then reports it as already verified', async () => {
    const t = await buildTestApp();

    try {
      await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username: 'alice', email: 'alice@example.com', password: 'pw123' },
      });
      const [msg] = t.queue.drainOfType('auth.verify-email');
      const url = `/auth/confirmed_email/${encodeURIComponent(msg?.verifyToken ?? '')}`;

      const first = await t.app.inject({ method: 'GET', url });
      expect(first.statusCode).toBe(200);
      expect(MessageBodySchema.parse(first.json()).message).toBe('Email successfully verified.');
      expect((await t.userRepo.findByEmail('alice@example.com'))?.isVerified).toBe(true);

      const second = await t.app.inject({ method: 'GET', url });
      expect(second.statusCode).toBe(200);
      expect(MessageBodySchema.parse(second.json()).message).toBe(
        'Your email is already verified.',
      );
    } finally {
      await t.close();
    }
  });

  it('routes a full-length signed token through the path parameter', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, {
        username: 'alice',
        email: 'alice@example.com',
        password: 'pw123',
        verified: false,
      });
      const token = t.deps.tokens.issue('EMAIL_VERIFY', 'alice@example.com');
      expect(token.length).toBeGreaterThan(100);

      const res = await t.app.inject({ method: 'GET', url: `/auth/confirmed_email/${token}` });

      expect(res.statusCode).toBe(200);
      expect(MessageBodySchema.parse(res.json()).message).toBe('Email successfully verified.');
    } finally {
      await t.close();
    }
  });

  it('returns 400 "Verification error" for an expired token and changes nothing', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, {
        username: 'alice',
        email: 'alice@example.com',
        password: 'pw123',
        verified: false,
      });
      const token = t.deps.tokens.issue('EMAIL_VERIFY', 'alice@example.com');

      t.clock.advanceSeconds(t.config.jwt.ttlSeconds.EMAIL_VERIFY);

      const res = await t.app.inject({ method: 'GET', url: `/auth/confirmed_email/${token}` });

      expect(res.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(res.json()).error).toEqual({
        code: 'INVALID_TOKEN',
        message: 'Verification error',
      });
      expect((await t.userRepo.findByEmail('alice@example.com'))?.isVerified).toBe(false);
    } finally {
      await t.close();
    }
  });

  it('rejects an ACCESS token presented as a confirmation token', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, {
        username: 'alice',
        email: 'alice@example.com',
        password: 'pw123',
        verified: false,
      });
      const token = t.deps.tokens.issue('ACCESS', 'alice@example.com');

      const res = await t.app.inject({ method: 'GET', url: `/auth/confirmed_email/${token}` });

      expect(res.statusCode).toBe(400);
      expect(ErrorBodySchema.parse(res.json()).error.message).toBe('Verification error');
    } finally {
      await t.close();
    }
  });
});

describe('POST /auth/request_email', () => {
  it('re-sends the verification email for an unverified account', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, {
        username: 'alice',
        email: 'alice@example.com',
        password: 'pw123',
        verified: false,
      });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/request_email',
        payload: { email: 'alice@example.com' },
      });

      expect(res.statusCode).toBe(200);
      expect(MessageBodySchema.parse(res.json()).message).toBe(
        'Check your email for verification instructions.',
      );

      const [msg] = t.queue.drainOfType('auth.verify-email');
      expect(await t.deps.tokens.validate(msg?.verifyToken ?? '', 'EMAIL_VERIFY')).toBe(
        'alice@example.com',
      );
    } finally {
      await t.close();
    }
  });

  it('sends nothing for an already verified account', async () => {
    const t = await buildTestApp();

    try {
      await seedUser(t, { username: 'alice', email: 'alice@example.com', password: 'pw123' });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/request_email',
        payload: { email: 'alice@example.com' },
      });

      expect(res.statusCode).toBe(200);
      expect(MessageBodySchema.parse(res.json()).message).toBe('Your email is already verified.');
      expect(t.queue.drain()).toEqual([]);
    } finally {
      await t.close();
    }
  });

  it('returns 404 for an unknown email', async () => {
    const t = await buildTestApp();

    try {
      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/request_email',
        payload: { email: 'nobody@example.com' },
      });

      expect(res.statusCode).toBe(404);
      expect(ErrorBodySchema.parse(res.json()).error.message).toBe('User not found');
    } finally {
      await t.close();
    }
  });
});
