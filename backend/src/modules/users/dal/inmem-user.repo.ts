/**
 * backend/src/modules/users/dal/inmem-user.repo.ts
 *
 * WHY:
 * - In-process UserRepository for tests and local runs without Postgres.
 * - Mirrors the DB constraints that matter: unique email, unique username,
 *   single-step conditional updates.
 *
 * RULES:
 * - Returns copies; callers can never mutate stored rows.
 */

import { randomUUID } from 'node:crypto';

import { UserConflictError } from '../user.repository';
import type { UserRepository } from '../user.repository';
import type { NewUser, Role, User } from '../user.types';

export class InMemUserRepo implements UserRepository {
  private readonly byId = new Map<string, User>();

  constructor(private readonly opts: { now?: () => Date } = {}) {}

  private now(): Date {
    return this.opts.now ? this.opts.now() : new Date();
  }

  private find(predicate: (u: User) => boolean): User | undefined {
    for (const user of this.byId.values()) {
      if (predicate(user)) return user;
    }
    return undefined;
  }

  private update(user: User | undefined, patch: Partial<User>): User | null {
    if (!user) return null;
    const next: User = { ...user, ...patch, updatedAt: this.now() };
    this.byId.set(next.id, next);
    return { ...next };
  }

  async findByEmail(email: string): Promise<User | null> {
    const normalized = email.toLowerCase();
    const user = this.find((u) => u.email === normalized);
    return user ? { ...user } : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const user = this.find((u) => u.username === username);
    return user ? { ...user } : null;
  }

  async create(input: NewUser): Promise<User> {
    const email = input.email.toLowerCase();

    if (this.find((u) => u.email === email)) throw new UserConflictError('email');
    if (this.find((u) => u.username === input.username)) throw new UserConflictError('username');

    const now = this.now();
    const user: User = {
      id: randomUUID(),
      username: input.username,
      email,
      passwordHash: input.passwordHash,
      isVerified: false,
      role: input.role ?? 'USER',
      avatarUrl: null,
      createdAt: now,
      updatedAt: now,
    };

    this.byId.set(user.id, user);
    return { ...user };
  }

  async markVerified(email: string): Promise<boolean> {
    const normalized = email.toLowerCase();
    const user = this.find((u) => u.email === normalized && !u.isVerified);
    return this.update(user, { isVerified: true }) !== null;
  }

  async updatePassword(email: string, passwordHash: string): Promise<boolean> {
    const normalized = email.toLowerCase();
    return this.update(this.find((u) => u.email === normalized), { passwordHash }) !== null;
  }

  async updateAvatar(email: string, avatarUrl: string): Promise<User | null> {
    const normalized = email.toLowerCase();
    return this.update(this.find((u) => u.email === normalized), { avatarUrl });
  }

  async updateRole(username: string, role: Role): Promise<User | null> {
    return this.update(this.find((u) => u.username === username), { role });
  }

  /** Test helper. */
  size(): number {
    return this.byId.size;
  }
}
