/**
 * backend/src/modules/auth/helpers/to-user-projection.ts
 *
 * Narrows a durable User to the cached projection (no hash, no avatar, no timestamps).
 */

import type { CachedUserProjection } from '../../../shared/session/session.types';
import type { User } from '../../users';

export function toUserProjection(user: User): CachedUserProjection {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    isVerified: user.isVerified,
    role: user.role,
  };
}
