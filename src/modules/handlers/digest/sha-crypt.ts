/**
 * src/modules/handlers/digest/sha-crypt.ts
 *
 * The SHA-256-crypt / SHA-512-crypt digest loop, built on node:crypto hashes.
 * Returns the raw digest; the format applies the byte transposition on render.
 */

import { createHash } from 'node:crypto';

export type ShaCryptDigest = 'sha256' | 'sha512';

function digestOf(algorithm: ShaCryptDigest, ...parts: Buffer[]): Buffer {
  const hash = createHash(algorithm);
  for (const part of parts) hash.update(part);
  return hash.digest();
}

/** `block` repeated and cut to exactly `size` bytes. */
function repeatTo(block: Buffer, size: number): Buffer {
  const out = Buffer.alloc(size);
  for (let offset = 0; offset < size; offset += block.length) {
    block.copy(out, offset, 0, Math.min(block.length, size - offset));
  }
  return out;
}

export function shaCryptDigest(
  algorithm: ShaCryptDigest,
  secret: Buffer,
  saltText: string,
  rounds: number,
): Buffer {
  const salt = Buffer.from(saltText, 'utf8');
  const size = secret.length;

  const b = digestOf(algorithm, secret, salt, secret);

  const a = createHash(algorithm);
  a.update(secret);
  a.update(salt);
  a.update(repeatTo(b, size));
  for (let bits = size; bits > 0; bits >>= 1) {
    a.update(bits & 1 ? b : secret);
  }
  const aDigest = a.digest();

  const dp = digestOf(algorithm, ...Array.from({ length: size }, () => secret));
  const p = repeatTo(dp, size);

  const first = aDigest[0] ?? 0;
  const ds = digestOf(algorithm, ...Array.from({ length: 16 + first }, () => salt));
  const s = repeatTo(ds, salt.length);

  let c = aDigest;
  for (let i = 0; i < rounds; i++) {
    const round = createHash(algorithm);
    round.update(i & 1 ? p : c);
    if (i % 3) round.update(s);
    if (i % 7) round.update(p);
    round.update(i & 1 ? c : p);
    c = round.digest();
  }
  return c;
}
