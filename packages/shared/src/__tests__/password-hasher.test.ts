import { describe, it, expect } from 'vitest';
import { Argon2PasswordHasher, LOCKED_PASSWORD_HASH } from '../auth/password-hasher';

describe('Argon2PasswordHasher', () => {
  const hasher = new Argon2PasswordHasher({ memoryCost: 1024, timeCost: 1 });

  it('produces an argon2 hash string', async () => {
    expect(await hasher.hash('test-password')).toMatch(/^\$argon2/);
  });

  it('verifies the password it hashed', async () => {
    const stored = await hasher.hash('test-password');
    expect(await hasher.verify('test-password', stored)).toBe(true);
    expect(await hasher.verify('other-password', stored)).toBe(false);
  });

  it('salts every hash', async () => {
    expect(await hasher.hash('test-password')).not.toBe(await hasher.hash('test-password'));
  });

  it('never accepts a locked account', async () => {
    expect(await hasher.verify('test-password', LOCKED_PASSWORD_HASH)).toBe(false);
    expect(await hasher.verify('test-password', '')).toBe(false);
  });

  it('treats a corrupt stored hash as a mismatch', async () => {
    expect(await hasher.verify('test-password', 'not-a-valid-hash')).toBe(false);
  });
});
