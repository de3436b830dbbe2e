/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations in DEV reliably.
 * - Migrations are listed statically, so the provider needs no filesystem scan
 *   and works the same from src/ (tsx) and from a bundle.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 * - Add a migration: create migrations/000N_<name>.ts and list it below.
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import type { Migration, MigrationProvider } from 'kysely';

import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

import * as m0001 from './migrations/0001_users';

const MIGRATIONS: Record<string, Migration> = {
  '0001_users': m0001,
};

const provider: MigrationProvider = {
  async getMigrations() {
    return MIGRATIONS;
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({ databaseUrl: config.databaseUrl });

  logger.info('db.migrate.start', { flow: 'db.migrate', count: Object.keys(MIGRATIONS).length });

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migrate.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migrate.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrate.failed', {
      flow: 'db.migrate',
      message: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
    return;
  }

  logger.info('db.migrate.done', { flow: 'db.migrate' });
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.crashed', {
    flow: 'db.migrate',
    message: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
});
