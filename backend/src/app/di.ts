/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely: the rate limiter,
 *   token revocations and the session cache all sit on the same Cache.
 * - Tests inject in-process fakes (InMemCache, InMemUserRepo, InMemQueue) through
 *   `infra`; nothing else changes between test and production wiring.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits) belong HERE,
 *   not inside the classes themselves (DIP).
 * - The cache lifecycle is owned here: connect() on build, disconnect() on close().
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { TokenService } from '../shared/security/token-service';
import { TokenRevocations } from '../shared/security/token-revocations';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { SessionCache } from '../shared/session/session-cache';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import { PgUserRepo } from '../modules/users';
import type { UserRepository } from '../modules/users';
import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

/** Infra that tests (or alternative deployments) may supply instead of the defaults. */
export type InfraOverrides = Partial<{
  cache: Cache;
  userRepo: UserRepository;
  queue: Queue;
  passwordHasher: PasswordHasher;
  /** Milliseconds since epoch; drives token iat/exp and revocation epochs. */
  now: () => number;
}>;

export type AppDeps = {
  /** Null when the user repository was injected (no Postgres pool is opened). */
  db: Db | null;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  passwordHasher: PasswordHasher;
  tokens: TokenService;
  revocations: TokenRevocations;
  sessionCache: SessionCache;

  userRepo: UserRepository;

  // messaging
  queue: Queue;

  // modules
  users: UserModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, infra: InfraOverrides = {}): Promise<AppDeps> {
  let db: Db | null = null;
  let userRepo: UserRepository;
  if (infra.userRepo) {
    userRepo = infra.userRepo;
  } else {
    db = createDb({ databaseUrl: config.databaseUrl });
    userRepo = new PgUserRepo(db);
  }

  // Redis is mandatory outside tests; its client is created here and connected below.
  const cache: Cache = infra.cache ?? RedisCache.create(config.redisUrl);
  await cache.connect();

  const passwordHasher: PasswordHasher =
    infra.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, config.rateLimits.policies, {
    prefix: 'rl',
    disabled: config.rateLimits.disabled,
    timeoutMs: config.cacheTimeoutMs,
  });

  const ttls = config.jwt.ttlSeconds;
  const revocations = new TokenRevocations(cache, {
    retentionSeconds: Math.max(ttls.ACCESS, ttls.EMAIL_VERIFY, ttls.PASSWORD_RESET),
    timeoutMs: config.cacheTimeoutMs,
    now: infra.now,
  });

  const tokens = new TokenService({
    secret: config.jwt.secret,
    issuer: config.jwt.issuer,
    ttlSeconds: ttls,
    revocations,
    now: infra.now,
  });

  const sessionCache = new SessionCache(cache, {
    ttlSeconds: config.userCacheTtlSeconds,
    timeoutMs: config.cacheTimeoutMs,
  });

  // Phase 1: in-memory queue (swap for an SQS/SMTP adapter here in production)
  const queue: Queue = infra.queue ?? new InMemQueue();

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ userRepo, sessionCache, revocations, logger });

  const auth = createAuthModule({
    userRepo,
    passwordHasher,
    tokens,
    revocations,
    sessionCache,
    queue,
    logger,
    publicBaseUrl: config.publicBaseUrl,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    passwordHasher,
    tokens,
    revocations,
    sessionCache,
    userRepo,
    queue,
    users,
    auth,
    close: async () => {
      await cache.disconnect();
      if (db) await db.destroy();
    },
  };
}
