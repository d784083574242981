/**
 * src/shared/security/random.ts
 *
 * WHY:
 * - Salts and vary_rounds jitter must come from a CSPRNG.
 * - Handlers and contexts depend on this interface so tests can inject a fixed source.
 *
 * RULES:
 * - Stateless per call (node:crypto is safe to share).
 * - `int(min, max)` is inclusive on both ends.
 */

import { randomBytes, randomInt } from 'node:crypto';

export interface RandomSource {
  bytes(size: number): Buffer;
  string(charset: string, size: number): string;
  int(min: number, max: number): number;
}

export const cryptoRandom: RandomSource = {
  bytes(size) {
    return randomBytes(size);
  },

  string(charset, size) {
    let out = '';
    for (let i = 0; i < size; i++) {
      out += charset.charAt(randomInt(charset.length));
    }
    return out;
  },

  int(min, max) {
    if (max <= min) return min;
    return randomInt(min, max + 1);
  },
};
