/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 * - Users are global: no tenant scoping here.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import { isRole } from '../user.types';
import type { User } from '../user.types';

export function toUser(row: UserRow): User {
  // The CHECK constraint keeps role in range; anything else is schema drift.
  if (!isRole(row.role)) {
    throw new Error(`users.role out of range: ${row.role}`);
  }

  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    isVerified: row.is_verified,
    role: row.role,
    avatarUrl: row.avatar_url ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | null> {
  const row = await selectUserSql(db, { email });
  return row ? toUser(row) : null;
}

export async function getUserByUsername(db: DbExecutor, username: string): Promise<User | null> {
  const row = await selectUserSql(db, { username });
  return row ? toUser(row) : null;
}
