/**
 * backend/src/modules/users/user.repository.ts
 *
 * WHY:
 * - The narrow contract the auth and users flows need from the durable user store.
 * - PgUserRepo implements it over Kysely; InMemUserRepo backs the tests.
 *
 * RULES:
 * - Emails are passed in already normalised (lowercase).
 * - Every mutation is a single statement; no read-modify-write.
 * - Uniqueness violations surface as UserConflictError, never as driver errors.
 */

import type { NewUser, Role, User } from './user.types';

export type UserConflictField = 'email' | 'username';

export class UserConflictError extends Error {
  constructor(readonly field: UserConflictField) {
    super(`User ${field} already exists`);
    this.name = 'UserConflictError';
  }
}

export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;

  /** Inserts an unverified user. Throws UserConflictError on a duplicate email/username. */
  create(input: NewUser): Promise<User>;

  /** Flips is_verified. Returns false when the user was already verified (or missing). */
  markVerified(email: string): Promise<boolean>;

  /** Returns false when no user has that email. */
  updatePassword(email: string, passwordHash: string): Promise<boolean>;

  updateAvatar(email: string, avatarUrl: string): Promise<User | null>;
  updateRole(username: string, role: Role): Promise<User | null>;
}
