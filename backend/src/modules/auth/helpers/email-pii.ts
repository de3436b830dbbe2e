/**
 * backend/src/modules/auth/helpers/email-pii.ts
 *
 * WHY:
 * - Operational logs must not carry raw emails, yet we need to correlate the
 *   log lines of one address across requests.
 * - emailDomain() keeps the coarse signal; emailKey() is a stable, non-reversible
 *   short id for the address.
 *
 * RULES:
 * - Pure functions.
 * - Never throws.
 */

import { createHash } from 'node:crypto';

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export function emailKey(email: string): string {
  return createHash('sha256').update(email.toLowerCase()).digest('hex').slice(0, 16);
}
