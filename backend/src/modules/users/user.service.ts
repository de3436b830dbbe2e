/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Profile read, avatar update and role change for authenticated users.
 *
 * RULES:
 * - Authorization is decided at the HTTP boundary (requireUser + capability).
 * - A role change invalidates the target's cached projection and revokes the
 *   target's ACCESS tokens: the new role must not be shadowed by a stale entry.
 * - Post-commit cache/revocation failures are logged, not surfaced; the durable
 *   change already happened.
 */

import type { Logger } from '../../shared/logger/logger';
import type { SessionCache } from '../../shared/session/session-cache';
import type { TokenRevocations } from '../../shared/security/token-revocations';

import type { UserRepository } from './user.repository';
import { toPublicUser } from './user.types';
import type { PublicUser, Role } from './user.types';
import { UserErrors } from './user.errors';

export type ChangeRoleParams = {
  actorUsername: string;
  targetUsername: string;
  role: Role;
  requestId: string;
};

export class UserService {
  constructor(
    private readonly deps: {
      userRepo: UserRepository;
      sessionCache: SessionCache;
      revocations: TokenRevocations;
      logger: Logger;
    },
  ) {}

  async getCurrentUser(username: string): Promise<PublicUser> {
    const user = await this.deps.userRepo.findByUsername(username);
    if (!user) throw UserErrors.userNotFound();
    return toPublicUser(user);
  }

  async updateAvatar(params: {
    email: string;
    avatarUrl: string;
    requestId: string;
  }): Promise<PublicUser> {
    const user = await this.deps.userRepo.updateAvatar(params.email, params.avatarUrl);
    if (!user) throw UserErrors.userNotFound();

    this.deps.logger.info({
      msg: 'users.avatar.updated',
      flow: 'users.avatar',
      requestId: params.requestId,
      userId: user.id,
    });

    return toPublicUser(user);
  }

  async changeRole(params: ChangeRoleParams): Promise<PublicUser> {
    const user = await this.deps.userRepo.updateRole(params.targetUsername, params.role);
    if (!user) throw UserErrors.userNotFound({ targetUsername: params.targetUsername });

    await this.deps.sessionCache.invalidate(user.username);

    try {
      await this.deps.revocations.revokeSubject('ACCESS', user.username);
    } catch (err) {
      this.deps.logger.error({
        msg: 'users.role.revoke_failed',
        flow: 'users.role',
        requestId: params.requestId,
        userId: user.id,
        message: err instanceof Error ? err.message : String(err),
      });
    }

    this.deps.logger.info({
      msg: 'users.role.changed',
      flow: 'users.role',
      requestId: params.requestId,
      userId: user.id,
      actor: params.actorUsername,
      role: user.role,
    });

    return toPublicUser(user);
  }
}
