import { hash, verify, type Options } from '@node-rs/argon2';
import { type PasswordHasher } from '@voltgate/domain';
import { createLogger } from '../logger';

const logger = createLogger({ name: 'password-hasher' });

/** Stored in place of a hash for accounts that must never log in with a password. */
export const LOCKED_PASSWORD_HASH = '!';

const DEFAULT_OPTIONS: Options = {
  memoryCost: 19456,
  timeCost: 2,
  outputLen: 32,
  parallelism: 1,
};

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly options: Options;

  constructor(options: Partial<Options> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async hash(password: string): Promise<string> {
    return hash(password, this.options);
  }

  /**
   * A stored value that is not an argon2 hash counts as a mismatch, so a
   * corrupt user row fails the login like a wrong password.
   */
  async verify(password: string, passwordHash: string): Promise<boolean> {
    if (passwordHash === LOCKED_PASSWORD_HASH || passwordHash === '') return false;
    try {
      return await verify(passwordHash, password, this.options);
    } catch (err) {
      logger.warn({ err }, 'Stored password hash could not be verified');
      return false;
    }
  }
}
