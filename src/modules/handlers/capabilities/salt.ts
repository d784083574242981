/**
 * src/modules/handlers/capabilities/salt.ts
 *
 * WHY:
 * - Schemes store salts either as raw bytes (encoded by the format) or as a string
 *   drawn from a restricted charset (embedded verbatim in the hash).
 * - Each handler picks one of these capabilities instead of inheriting salt behavior.
 *
 * HOW TO USE:
 * - byteSalt({ minSize: 0, maxSize: 1024, defaultSize: 16 })
 * - charSalt({ maxSize: 16, charset: HASH64_CHARS })
 * - noSalt() for schemes without a salt (degenerate, always empty)
 */

import type { RandomSource } from '../../../shared/security/random';
import { HandlerErrors } from '../handler.errors';
import type { Salt, SaltCapability } from '../handler.types';

type SizeBounds = {
  minSize?: number;
  maxSize: number;
  /** Defaults to maxSize. */
  defaultSize?: number;
};

export class ByteSalt implements SaltCapability<Buffer> {
  readonly kind = 'bytes';
  readonly minSize: number;
  readonly maxSize: number;
  readonly defaultSize: number;

  constructor(bounds: SizeBounds) {
    this.minSize = bounds.minSize ?? 0;
    this.maxSize = bounds.maxSize;
    this.defaultSize = bounds.defaultSize ?? bounds.maxSize;
  }

  accept(value: Salt): Buffer {
    // Strings are taken as their UTF-8 bytes.
    return typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
  }

  sizeOf(salt: Buffer): number {
    return salt.length;
  }

  truncate(salt: Buffer, size: number): Buffer {
    return salt.subarray(0, size);
  }

  generate(size: number, random: RandomSource): Buffer {
    return random.bytes(size);
  }
}

export class CharSalt implements SaltCapability<string> {
  readonly kind = 'chars';
  readonly minSize: number;
  readonly maxSize: number;
  readonly defaultSize: number;
  readonly charset: string;
  readonly defaultCharset: string;
  readonly forbiddenChars?: string;
  private readonly canonicalize?: (salt: string) => string;
  private readonly allowed: Set<string>;
  private readonly forbidden?: Set<string>;

  constructor(
    bounds: SizeBounds & {
      charset: string;
      defaultCharset?: string;
      /** Accept anything but these characters; `charset` then only governs generation. */
      forbiddenChars?: string;
      /** Rewrites an accepted salt into its canonical spelling (e.g. bcrypt's final char). */
      canonicalize?: (salt: string) => string;
    },
  ) {
    this.minSize = bounds.minSize ?? bounds.maxSize;
    this.maxSize = bounds.maxSize;
    this.defaultSize = bounds.defaultSize ?? bounds.maxSize;
    this.charset = bounds.charset;
    this.defaultCharset = bounds.defaultCharset ?? bounds.charset;
    this.canonicalize = bounds.canonicalize;
    this.allowed = new Set(bounds.charset);
    if (bounds.forbiddenChars !== undefined) {
      this.forbiddenChars = bounds.forbiddenChars;
      this.forbidden = new Set(bounds.forbiddenChars);
    }
  }

  accept(value: Salt, scheme: string): string {
    if (typeof value !== 'string') {
      throw HandlerErrors.settingOutOfRange(scheme, 'salt must be a string');
    }
    for (const c of value) {
      if (this.forbidden ? this.forbidden.has(c) : !this.allowed.has(c)) {
        throw HandlerErrors.settingOutOfRange(scheme, 'salt contains invalid characters');
      }
    }
    return value;
  }

  sizeOf(salt: string): number {
    return salt.length;
  }

  truncate(salt: string, size: number): string {
    return salt.slice(0, size);
  }

  generate(size: number, random: RandomSource): string {
    return this.canonical(random.string(this.defaultCharset, size));
  }

  /** Applied after size normalization, so the canonical form sees the final length. */
  canonical(salt: string): string {
    return this.canonicalize ? this.canonicalize(salt) : salt;
  }
}

export function byteSalt(bounds: SizeBounds): ByteSalt {
  return new ByteSalt(bounds);
}

export function charSalt(
  bounds: SizeBounds & {
    charset: string;
    defaultCharset?: string;
    forbiddenChars?: string;
    canonicalize?: (salt: string) => string;
  },
): CharSalt {
  return new CharSalt(bounds);
}

export function noSalt(): ByteSalt {
  return new ByteSalt({ minSize: 0, maxSize: 0, defaultSize: 0 });
}
