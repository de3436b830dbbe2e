/**
 * src/shared/security/rate-limit.policies.ts
 *
 * WHY:
 * - Budgets are configuration, not code: one policy per route class.
 * - Defaults live here; app/config.ts may override fixed-window budgets from env.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const ROUTE_CLASSES = [
  'auth.register',
  'auth.login',
  'auth.email',
  'auth.password',
  'users.read',
  'users.write',
] as const;

export type RouteClass = (typeof ROUTE_CLASSES)[number];

export type FixedWindowPolicy = {
  kind: 'fixed-window';
  limit: number;
  windowSeconds: number;
};

export type TokenBucketPolicy = {
  kind: 'token-bucket';
  capacity: number;
  refillPerSecond: number;
};

export type RateLimitPolicy = FixedWindowPolicy | TokenBucketPolicy;

export type RateLimitPolicies = Record<RouteClass, RateLimitPolicy>;

export const DEFAULT_RATE_LIMIT_POLICIES: RateLimitPolicies = {
  'auth.register': { kind: 'fixed-window', limit: 10, windowSeconds: 900 },
  'auth.login': { kind: 'fixed-window', limit: 5, windowSeconds: 900 },
  'auth.email': { kind: 'fixed-window', limit: 3, windowSeconds: 3600 },
  'auth.password': { kind: 'fixed-window', limit: 5, windowSeconds: 900 },
  // Reads are bursty; a bucket absorbs page loads without a hard window edge.
  'users.read': { kind: 'token-bucket', capacity: 30, refillPerSecond: 1 },
  'users.write': { kind: 'fixed-window', limit: 20, windowSeconds: 60 },
};
