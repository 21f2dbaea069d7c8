import { hash, verify } from '@node-rs/argon2';
import { type PasswordHasher } from '@inkwell/domain';

const ARGON2_OPTIONS = {
  memoryCost: 19456,
  timeCost: 2,
  outputLen: 32,
  parallelism: 1,
};

/**
 * Argon2id hasher. The PHC string it produces embeds its own random salt, so
 * users carry a single `passwordHash` column.
 */
export class Argon2PasswordHasher implements PasswordHasher {
  async hash(password: string): Promise<string> {
    return hash(password, ARGON2_OPTIONS);
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, password, ARGON2_OPTIONS);
    } catch {
      // malformed PHC strings never match
      return false;
    }
  }
}
