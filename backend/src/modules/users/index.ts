/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { ROLES, isRole, toPublicUser } from './user.types';
export type { NewUser, PublicUser, Role, User, UserId } from './user.types';
export { UserConflictError } from './user.repository';
export type { UserRepository } from './user.repository';
export { PgUserRepo } from './dal/user.repo';
export { InMemUserRepo } from './dal/inmem-user.repo';
export { UserErrors } from './user.errors';
