/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching flows.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Email normalized to lowercase in flows, not here.
 * - Password bounds come from PASSWORD_LENGTH (shared with the hasher).
 * - Tokens are only checked for presence here; the TokenService validates them.
 */

import { z } from 'zod';

import { PASSWORD_LENGTH } from '../../shared/security/password-hasher';

const passwordSchema = z
  .string()
  .min(PASSWORD_LENGTH.min, `Password must be at least ${PASSWORD_LENGTH.min} characters`)
  .max(PASSWORD_LENGTH.max, `Password must be at most ${PASSWORD_LENGTH.max} characters`);

export const registerSchema = z.object({
  username: z
    .string()
    .min(3, 'Username must be at least 3 characters')
    .max(50)
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may contain letters, digits, "_", "." and "-"'),
  email: z.string().email('Invalid email address'),
  password: passwordSchema,
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

/** Resend verification email / forgot password. */
export const requestEmailSchema = z.object({
  email: z.string().email('Invalid email address'),
});

export type RequestEmailInput = z.infer<typeof requestEmailSchema>;

export const tokenParamsSchema = z.object({
  token: z.string().min(1, 'Token is required'),
});

export const resetPasswordSchema = z.object({
  newPassword: passwordSchema,
});

export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;
