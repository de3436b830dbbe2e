/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Request validation for the Users module.
 */

import { z } from 'zod';
import { ROLES } from './user.types';

export const updateAvatarSchema = z.object({
  avatarUrl: z.string().url('Invalid avatar URL').max(2048),
});

export type UpdateAvatarInput = z.infer<typeof updateAvatarSchema>;

export const usernameParamsSchema = z.object({
  username: z.string().min(1).max(50),
});

export const changeRoleSchema = z.object({
  role: z.enum(ROLES),
});

export type ChangeRoleInput = z.infer<typeof changeRoleSchema>;
