/**
 * backend/src/shared/security/password-hasher.ts
 *
 * Credential hashing port. Flows hash on register/reset and verify on login;
 * only app/di.ts knows which algorithm sits behind it.
 *
 * PASSWORD_LENGTH bounds the plain password before any hasher sees it.
 * The ceiling is bcrypt's: input past 72 bytes is ignored by the algorithm.
 */

export const PASSWORD_LENGTH = { min: 4, max: 72 } as const;

export interface PasswordHasher {
  /** Salted one-way hash; hashing the same password twice gives different strings. */
  hash(plain: string): Promise<string>;

  /** False on mismatch and on a hash this hasher cannot read. Never throws. */
  verify(plain: string, hash: string): Promise<boolean>;
}
