/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Callers should depend on an interface (DIP), not on a scheme or on CryptContext directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 * - if (await hasher.needsRehash(hash)) store(await hasher.hash(password))
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
  needsRehash(hash: string): Promise<boolean>;
}
