/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Postgres implementation of UserRepository.
 * - Users are global identities; writes are NOT tenant-scoped.
 *
 * RULES:
 * - No transactions started here; every mutation is one statement.
 * - No AppError (UserConflictError is the module's own signal).
 * - No policies.
 */

import { violatedUniqueConstraint } from '../../../shared/db/db';
import type { DbExecutor } from '../../../shared/db/db';
import { UserConflictError } from '../user.repository';
import type { UserRepository } from '../user.repository';
import type { NewUser, Role, User } from '../user.types';
import { getUserByEmail, getUserByUsername, toUser } from '../queries/user.queries';

function toConflict(err: unknown): UserConflictError | null {
  const constraint = violatedUniqueConstraint(err);
  if (constraint === null) return null;
  return new UserConflictError(constraint === 'users_username_unique' ? 'username' : 'email');
}

export class PgUserRepo implements UserRepository {
  constructor(private readonly db: DbExecutor) {}

  findByEmail(email: string): Promise<User | null> {
    return getUserByEmail(this.db, email);
  }

  findByUsername(username: string): Promise<User | null> {
    return getUserByUsername(this.db, username);
  }

  async create(input: NewUser): Promise<User> {
    try {
      const row = await this.db
        .insertInto('users')
        .values({
          username: input.username,
          email: input.email.toLowerCase(),
          password_hash: input.passwordHash,
          role: input.role ?? 'USER',
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toUser(row);
    } catch (err) {
      throw toConflict(err) ?? err;
    }
  }

  async markVerified(email: string): Promise<boolean> {
    const result = await this.db
      .updateTable('users')
      .set({ is_verified: true, updated_at: new Date() })
      .where('email', '=', email.toLowerCase())
      .where('is_verified', '=', false)
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }

  async updatePassword(email: string, passwordHash: string): Promise<boolean> {
    const result = await this.db
      .updateTable('users')
      .set({ password_hash: passwordHash, updated_at: new Date() })
      .where('email', '=', email.toLowerCase())
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }

  async updateAvatar(email: string, avatarUrl: string): Promise<User | null> {
    const row = await this.db
      .updateTable('users')
      .set({ avatar_url: avatarUrl, updated_at: new Date() })
      .where('email', '=', email.toLowerCase())
      .returningAll()
      .executeTakeFirst();

    return row ? toUser(row) : null;
  }

  async updateRole(username: string, role: Role): Promise<User | null> {
    const row = await this.db
      .updateTable('users')
      .set({ role, updated_at: new Date() })
      .where('username', '=', username)
      .returningAll()
      .executeTakeFirst();

    return row ? toUser(row) : null;
  }
}
