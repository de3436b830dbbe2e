/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a slow, salted, battle-tested password hashing algorithm.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 *
 * RULES:
 * - Comparison is bcrypt.compare only (constant-time inside the algorithm).
 * - A malformed hash verifies as false. Callers can't tell "bad hash" from
 *   "wrong password", and neither can the response.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';
import { logger } from '../logger/logger';

// $2a$ / $2b$ / $2y$, two-digit cost, 53 chars of salt + digest.
const BCRYPT_HASH_SHAPE = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    if (!BCRYPT_HASH_SHAPE.test(hash)) return false;

    try {
      return await bcrypt.compare(plain, hash);
    } catch (err) {
      logger.warn('password_hasher.compare_failed', {
        flow: 'security.password',
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
