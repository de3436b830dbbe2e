/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime: a bad value fails at startup.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - buildConfig(env) takes any env record, so tests can build one without
 *   touching process.env.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 *
 * RATE LIMITS:
 * - RATE_LIMIT_<CLASS>=a/b overrides one route class, where CLASS is the route class
 *   upper-cased with "." → "_" (auth.login → RATE_LIMIT_AUTH_LOGIN).
 *   Fixed-window classes read a/b as limit/windowSeconds; token-bucket classes as
 *   capacity/refillPerSecond.
 */

import 'dotenv/config';
import { z } from 'zod';

import { MIN_SECRET_LENGTH } from '../shared/security/token-service';
import type { TokenTtls } from '../shared/security/token.types';
import {
  DEFAULT_RATE_LIMIT_POLICIES,
  ROUTE_CLASSES,
} from '../shared/security/rate-limit.policies';
import type { RateLimitPolicies, RouteClass } from '../shared/security/rate-limit.policies';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats "false" as true; be explicit.
const BoolSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ttlSeconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('tenant-auth-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Tokens
  JWT_SECRET: z
    .string()
    .min(MIN_SECRET_LENGTH, `JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters`),
  JWT_ISSUER: z.string().min(1).default('tenant-auth'),
  ACCESS_TOKEN_TTL_SECONDS: ttlSeconds(1800),
  EMAIL_VERIFY_TOKEN_TTL_SECONDS: ttlSeconds(86400),
  PASSWORD_RESET_TOKEN_TTL_SECONDS: ttlSeconds(3600),

  // Session cache
  USER_CACHE_TTL_SECONDS: ttlSeconds(3600),
  CACHE_TIMEOUT_MS: z.coerce.number().int().positive().default(200),

  // Links in outgoing emails
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),

  RATE_LIMIT_DISABLED: BoolSchema,
});

const RateLimitOverrideSchema = z
  .string()
  .regex(/^\d+(\.\d+)?\/\d+(\.\d+)?$/, 'expected "<number>/<number>"')
  .transform((v) => {
    const [a, b] = v.split('/');
    return [Number(a), Number(b)] as const;
  })
  .refine(([a, b]) => a > 0 && b > 0, 'both numbers must be positive');

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  host: string;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: {
    secret: string;
    issuer: string;
    ttlSeconds: TokenTtls;
  };

  userCacheTtlSeconds: number;
  cacheTimeoutMs: number;

  publicBaseUrl: string;

  rateLimits: {
    disabled: boolean;
    policies: RateLimitPolicies;
  };
};

export function rateLimitEnvName(routeClass: RouteClass): string {
  return `RATE_LIMIT_${routeClass.toUpperCase().replace(/\./g, '_')}`;
}

function buildRateLimitPolicies(env: NodeJS.ProcessEnv): RateLimitPolicies {
  const policies: RateLimitPolicies = { ...DEFAULT_RATE_LIMIT_POLICIES };

  for (const routeClass of ROUTE_CLASSES) {
    const name = rateLimitEnvName(routeClass);
    const raw = env[name];
    if (raw === undefined || raw === '') continue;

    const parsed = RateLimitOverrideSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid ${name}: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
    }

    const [a, b] = parsed.data;
    const base = policies[routeClass];

    policies[routeClass] =
      base.kind === 'fixed-window'
        ? { kind: 'fixed-window', limit: Math.floor(a), windowSeconds: Math.floor(b) }
        : { kind: 'token-bucket', capacity: Math.floor(a), refillPerSecond: b };
  }

  return policies;
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: {
      secret: parsed.JWT_SECRET,
      issuer: parsed.JWT_ISSUER,
      ttlSeconds: {
        ACCESS: parsed.ACCESS_TOKEN_TTL_SECONDS,
        EMAIL_VERIFY: parsed.EMAIL_VERIFY_TOKEN_TTL_SECONDS,
        PASSWORD_RESET: parsed.PASSWORD_RESET_TOKEN_TTL_SECONDS,
      },
    },

    userCacheTtlSeconds: parsed.USER_CACHE_TTL_SECONDS,
    cacheTimeoutMs: parsed.CACHE_TIMEOUT_MS,

    publicBaseUrl: parsed.PUBLIC_BASE_URL,

    rateLimits: {
      disabled: parsed.RATE_LIMIT_DISABLED,
      policies: buildRateLimitPolicies(env),
    },
  };
}
