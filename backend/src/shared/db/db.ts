/**
 * backend/src/shared/db/db.ts
 *
 * Kysely over a pg pool. Built once in app/di.ts (and by migrate.ts); repositories
 * receive a DbExecutor and never see the pool.
 *
 * The pool emits 'error' when an idle client loses its connection. Unhandled,
 * that event would crash the process, so it is logged and the client dropped.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './db.schema';
import { logger } from '../logger/logger';

export type Db = Kysely<DB>;

/** What DAL and query functions accept: the root handle or a transaction. */
export type DbExecutor = Kysely<DB>;

export type DbOptions = {
  databaseUrl: string;
  poolMax?: number;
};

export function createDb(opts: DbOptions): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: opts.poolMax ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (err) => {
    logger.error('db.pool.idle_client_error', { flow: 'db', message: err.message });
  });

  return new Kysely<DB>({ dialect: new PostgresDialect({ pool }) });
}

const UNIQUE_VIOLATION = '23505';

/**
 * Name of the unique constraint a write violated, or null for any other error.
 * Lets a repository turn a race on a unique column into its own conflict signal.
 */
export function violatedUniqueConstraint(err: unknown): string | null {
  if (!(err instanceof pg.DatabaseError) || err.code !== UNIQUE_VIOLATION) return null;
  return err.constraint ?? null;
}
