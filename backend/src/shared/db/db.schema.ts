/**
 * backend/src/shared/db/db.schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - The schema is small and owned by migrations/; this file mirrors it by hand.
 *
 * RULES:
 * - Keep in lockstep with migrations/ (snake_case, exactly as in Postgres).
 * - Domain mapping (camelCase, Role narrowing) happens in modules/<x>/queries, not here.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: Generated<string>;
  username: string;
  email: string;
  password_hash: string;
  is_verified: Generated<boolean>;
  role: Generated<string>;
  avatar_url: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface DB {
  users: UsersTable;
}
