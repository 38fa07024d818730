import { hash, verify, type Options } from '@node-rs/argon2';
import { type PasswordHasher } from '@soiree/domain';

export interface PasswordHashingOptions {
  /** KiB of memory per hash. */
  memoryCost: number;
  /** Passes over that memory. */
  timeCost: number;
}

/**
 * argon2id at 19 MiB and two passes, the OWASP baseline for argon2id. Hashes
 * record their own parameters, so raising the cost later still verifies old
 * accounts.
 */
export const DEFAULT_PASSWORD_HASHING: PasswordHashingOptions = {
  memoryCost: 19456,
  timeCost: 2,
};

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly options: Options;

  constructor(opts: PasswordHashingOptions = DEFAULT_PASSWORD_HASHING) {
    this.options = {
      memoryCost: opts.memoryCost,
      timeCost: opts.timeCost,
      outputLen: 32,
      parallelism: 1,
    };
  }

  async hash(password: string): Promise<string> {
    return hash(password, this.options);
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, password, this.options);
    } catch {
      // malformed or foreign hash format
      return false;
    }
  }
}
