import type { RandomSource } from '../../src/shared/security/random';

/**
 * Deterministic RandomSource for tests.
 * - bytes: filled with `fill`
 * - string: the first charset character, repeated
 * - int: the lower (or upper) end of the requested range
 */
export function fixedRandom(opts: { fill?: number; pick?: 'min' | 'max' } = {}): RandomSource {
  return {
    bytes: (size) => Buffer.alloc(size, opts.fill ?? 0xab),
    string: (charset, size) => charset.charAt(0).repeat(size),
    int: (min, max) => (opts.pick === 'max' ? max : min),
  };
}
