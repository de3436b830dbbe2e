import { describe, it, expect } from 'vitest';

import { buildConfig, rateLimitEnvName } from '../../../src/app/config';
import { DEFAULT_RATE_LIMIT_POLICIES } from '../../../src/shared/security/rate-limit.policies';

const baseEnv = {
  DATABASE_URL: 'postgres://localhost/tenant_auth',
  REDIS_URL: 'redis://localhost:6379',
  JWT_SECRET: 'test-secret-test-secret-test-secret!',
};

describe('buildConfig', () => {
  it('applies defaults for everything optional', () => {
    const config = buildConfig(baseEnv);

    expect(config).toMatchObject({
      nodeEnv: 'development',
      port: 3000,
      host: '0.0.0.0',
      bcryptCost: 12,
      jwt: {
        issuer: 'tenant-auth',
        ttlSeconds: { ACCESS: 1800, EMAIL_VERIFY: 86400, PASSWORD_RESET: 3600 },
      },
      userCacheTtlSeconds: 3600,
      cacheTimeoutMs: 200,
      publicBaseUrl: 'http://localhost:3000',
      rateLimits: { disabled: false, policies: DEFAULT_RATE_LIMIT_POLICIES },
    });
  });

  it('reads TTLs and flags from env strings', () => {
    const config = buildConfig({
      ...baseEnv,
      ACCESS_TOKEN_TTL_SECONDS: '60',
      USER_CACHE_TTL_SECONDS: '120',
      RATE_LIMIT_DISABLED: 'false',
    });

    expect(config.jwt.ttlSeconds.ACCESS).toBe(60);
    expect(config.userCacheTtlSeconds).toBe(120);
    expect(config.rateLimits.disabled).toBe(false);

    expect(buildConfig({ ...baseEnv, RATE_LIMIT_DISABLED: '1' }).rateLimits.disabled).toBe(true);
  });

  it('refuses a short signing secret', () => {
    expect(() => buildConfig({ ...baseEnv, JWT_SECRET: 'too-short' })).toThrow(
      'JWT_SECRET must be at least 32 characters',
    );
  });

  it('refuses non-positive TTLs and a low bcrypt cost', () => {
    expect(() => buildConfig({ ...baseEnv, ACCESS_TOKEN_TTL_SECONDS: '0' })).toThrow();
    expect(() => buildConfig({ ...baseEnv, BCRYPT_COST: '4' })).toThrow();
  });

  it('overrides a route class budget from RATE_LIMIT_<CLASS>', () => {
    expect(rateLimitEnvName('auth.login')).toBe('RATE_LIMIT_AUTH_LOGIN');

    const config = buildConfig({
      ...baseEnv,
      RATE_LIMIT_AUTH_LOGIN: '3/60',
      RATE_LIMIT_USERS_READ: '10/0.5',
    });

    expect(config.rateLimits.policies['auth.login']).toEqual({
      kind: 'fixed-window',
      limit: 3,
      windowSeconds: 60,
    });
    expect(config.rateLimits.policies['users.read']).toEqual({
      kind: 'token-bucket',
      capacity: 10,
      refillPerSecond: 0.5,
    });
    expect(config.rateLimits.policies['auth.register']).toEqual(
      DEFAULT_RATE_LIMIT_POLICIES['auth.register'],
    );
  });

  it('refuses a malformed rate limit override', () => {
    expect(() => buildConfig({ ...baseEnv, RATE_LIMIT_AUTH_LOGIN: 'five' })).toThrow(
      'Invalid RATE_LIMIT_AUTH_LOGIN',
    );
    expect(() => buildConfig({ ...baseEnv, RATE_LIMIT_AUTH_LOGIN: '0/60' })).toThrow(
      'Invalid RATE_LIMIT_AUTH_LOGIN',
    );
  });
});
