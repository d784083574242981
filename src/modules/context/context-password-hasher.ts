/**
 * src/modules/context/context-password-hasher.ts
 *
 * WHY:
 * - Services talk to PasswordHasher (async); the context does the actual work (sync).
 * - Unknown or malformed stored hashes are a failed login, not a crash.
 *
 * HOW TO USE:
 * - const hasher = new ContextPasswordHasher(context, { category: 'admin' })
 * - const ok = await hasher.verify(password, storedHash)
 */

import { isPasshashError } from '../../shared/errors/errors';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { CryptContext } from './crypt-context';

export class ContextPasswordHasher implements PasswordHasher {
  private readonly category?: string;

  constructor(
    private readonly context: CryptContext,
    opts?: { category?: string },
  ) {
    this.category = opts?.category;
  }

  async hash(plain: string): Promise<string> {
    return this.context.encrypt(plain, { category: this.category });
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    try {
      return this.context.verify(plain, hash, { category: this.category });
    } catch (err) {
      if (isPasshashError(err, 'UNKNOWN_SCHEME') || isPasshashError(err, 'INVALID_HASH')) {
        return false;
      }
      throw err;
    }
  }

  async needsRehash(hash: string): Promise<boolean> {
    try {
      return this.context.needsUpdate(hash, { category: this.category });
    } catch (err) {
      // A hash no configured scheme understands can only be fixed by rehashing.
      if (isPasshashError(err, 'UNKNOWN_SCHEME') || isPasshashError(err, 'INVALID_HASH')) {
        return true;
      }
      throw err;
    }
  }
}
