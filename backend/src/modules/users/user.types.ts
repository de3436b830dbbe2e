/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are global identities (not tenant-scoped).
 * - One email = one user across all tenants; usernames are unique too.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash never leaves the module boundary: responses use PublicUser.
 */

export const ROLES = ['USER', 'ADMIN'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

export type UserId = string;

export type User = {
  id: UserId;
  username: string;
  email: string;
  passwordHash: string;
  isVerified: boolean;
  role: Role;
  avatarUrl: string | null;

  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  username: string;
  /** Normalised (lowercase). */
  email: string;
  passwordHash: string;
  role?: Role;
};

export type PublicUser = {
  id: UserId;
  username: string;
  email: string;
  isVerified: boolean;
  role: Role;
  avatarUrl: string | null;
  createdAt: string;
};

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    isVerified: user.isVerified,
    role: user.role,
    avatarUrl: user.avatarUrl,
    createdAt: user.createdAt.toISOString(),
  };
}
