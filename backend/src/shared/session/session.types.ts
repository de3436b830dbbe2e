/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the compact projection of a user that is cached after login.
 * - The projection is a best-effort shadow of the durable user row; the
 *   repository stays the source of truth.
 *
 * RULES:
 * - Must be JSON-serializable (stored in Redis as a JSON string).
 * - Never store password hashes or tokens here.
 */

import { z } from 'zod';
import { ROLES } from '../../modules/users/user.types';

export const cachedUserProjectionSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
  email: z.string().min(1),
  isVerified: z.boolean(),
  role: z.enum(ROLES),
});

export type CachedUserProjection = z.infer<typeof cachedUserProjectionSchema>;

/**
 * Key prefix in Redis. Full key: `user:{username}`.
 */
export const USER_CACHE_KEY_PREFIX = 'user';

export const DEFAULT_USER_CACHE_TTL_SECONDS = 3600;
