import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import type { AuthContext } from '../../../../src/shared/http/auth-context';
import { requireUser } from '../../../../src/shared/http/require-auth-context';

function makeReq(authContext: AuthContext | null): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

const anonymous: AuthContext = {
  userId: null,
  username: null,
  email: null,
  role: null,
  isVerified: false,
  token: null,
};

function authenticated(role: 'USER' | 'ADMIN'): AuthContext {
  return {
    userId: '1',
    username: 'alice',
    email: 'alice@example.com',
    role,
    isVerified: true,
    token: { tokenId: 'token-1', expiresAt: 1_900_000_000 },
  };
}

function catchAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

describe('requireUser', () => {
  it('throws 401 when no user is authenticated', () => {
    for (const ctx of [null, anonymous]) {
      const e = catchAppError(() => requireUser(makeReq(ctx)));
      expect(e.status).toBe(401);
      expect(e.code).toBe('UNAUTHORIZED');
      expect(e.message).toBe('Could not validate credentials');
    }
  });

  it('throws 403 when the role lacks the capability', () => {
    const e = catchAppError(() =>
      requireUser(makeReq(authenticated('USER')), { capability: 'role:change' }),
    );

    expect(e.status).toBe(403);
    expect(e.message).toBe('Insufficient role.');
  });

  it('returns the narrowed context when authorized', () => {
    expect(requireUser(makeReq(authenticated('ADMIN')), { capability: 'role:change' })).toEqual({
      userId: '1',
      username: 'alice',
      email: 'alice@example.com',
      role: 'ADMIN',
      token: { tokenId: 'token-1', expiresAt: 1_900_000_000 },
    });
    expect(requireUser(makeReq(authenticated('USER'))).username).toBe('alice');
  });
});
