import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from '../../../../src/shared/security/bcrypt-password-hasher';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: 4 });

  it('verifies the password it hashed and rejects any other', async () => {
    const hash = await hasher.hash('pw123');

    expect(hash).toMatch(/^\$2b\$04\$/);
    expect(await hasher.verify('pw123', hash)).toBe(true);
    expect(await hasher.verify('pw124', hash)).toBe(false);
  });

  it('salts every hash', async () => {
    const a = await hasher.hash('same-password');
    const b = await hasher.hash('same-password');

    expect(a).not.toBe(b);
    expect(await hasher.verify('same-password', a)).toBe(true);
    expect(await hasher.verify('same-password', b)).toBe(true);
  });

  it('returns false (never throws) for malformed hashes', async () => {
    for (const bad of ['', 'plain-text', '$2b$04$short', '$argon2id$v=19$m=65536,t=3,p=4$abc']) {
      await expect(hasher.verify('pw123', bad)).resolves.toBe(false);
    }
  });
});
