import { pbkdf2Sync } from 'node:crypto';

export type Pbkdf2Digest = 'sha1' | 'sha256' | 'sha512';

/** Node caps the iteration count at a signed 32-bit integer. */
export const PBKDF2_MAX_ROUNDS = 2 ** 31 - 1;

export function pbkdf2(
  secret: Buffer,
  salt: Buffer | string,
  rounds: number,
  keyLength: number,
  digest: Pbkdf2Digest,
): Buffer {
  return pbkdf2Sync(secret, salt, rounds, keyLength, digest);
}
