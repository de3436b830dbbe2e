/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * Raw reads of the users table. Both lookups the service needs go through a
 * unique index (users_email_unique, users_username_unique), so one row at most.
 * Email is stored lower-cased; usernames are matched exactly as stored.
 *
 * No AppError and no policies here; queries/user.queries.ts maps rows to User.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/db.schema';

export type UserRow = Selectable<UsersTable>;

export type UserLookup = { email: string } | { username: string };

const USER_COLUMNS = [
  'id',
  'username',
  'email',
  'password_hash',
  'is_verified',
  'role',
  'avatar_url',
  'created_at',
  'updated_at',
] as const;

export async function selectUserSql(
  db: DbExecutor,
  lookup: UserLookup,
): Promise<UserRow | undefined> {
  const base = db.selectFrom('users').select(USER_COLUMNS);

  const query =
    'email' in lookup
      ? base.where('email', '=', lookup.email.toLowerCase())
      : base.where('username', '=', lookup.username);

  return query.executeTakeFirst();
}
