/**
 * backend/src/modules/auth/policies/login-account-gating.policy.ts
 *
 * WHY:
 * - Which accounts may attempt a password check is a business/security rule.
 * - Keep it pure + unit-testable (no DB, no HTTP).
 *
 * RULES (order is part of the contract):
 * - No user for the email → user_not_found (404).
 * - User exists but email not confirmed → unverified (401 UNVERIFIED).
 * - Otherwise OK; the password check comes next.
 */

import { AuthErrors } from '../auth.errors';

export type LoginAccountLike = Readonly<{
  id: string;
  isVerified: boolean;
}>;

export type LoginAccountGatingFailure =
  | { reason: 'user_not_found'; error: Error }
  | { reason: 'unverified'; error: Error };

/**
 * Returns null when OK; otherwise the failure payload (reason + error), so the flow
 * can log the reason before throwing.
 */
export function getLoginAccountGatingFailure(
  account: LoginAccountLike | null,
): LoginAccountGatingFailure | null {
  if (!account) {
    return { reason: 'user_not_found', error: AuthErrors.userNotFound() };
  }
  if (!account.isVerified) {
    return { reason: 'unverified', error: AuthErrors.unverified() };
  }
  return null;
}

/**
 * Asserts the account may log in and narrows the type for the rest of the flow.
 * `onRejected` sees the failure (for logging) right before its error is thrown.
 */
export function assertLoginAccountAllowed<T extends LoginAccountLike>(
  account: T | null,
  onRejected?: (failure: LoginAccountGatingFailure) => void,
): asserts account is T {
  const failure = getLoginAccountGatingFailure(account);
  if (!failure) return;

  onRejected?.(failure);
  throw failure.error;
}
