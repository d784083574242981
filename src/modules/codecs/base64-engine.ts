/**
 * src/modules/codecs/base64-engine.ts
 *
 * WHY:
 * - Crypt-style formats encode bytes with a 64-symbol alphabet, but they disagree on
 *   the alphabet, on bit order, and on padding.
 * - One packing routine serves all of them; presets below cover the formats we ship.
 *
 * BIT ORDER:
 * - 'little' (hash64): the first byte feeds the low bits of the first symbol.
 *   [v1, v2, v3] -> v1 | v2 << 8 | v3 << 16, emitted 6 bits at a time from bit 0.
 * - 'big' (standard base64): [v1, v2, v3] -> v1 << 16 | v2 << 8 | v3, emitted from bit 18.
 *
 * PARTIAL GROUPS:
 * - 2 bytes -> 3 symbols, 1 byte -> 2 symbols.
 * - Bits past the supplied bytes are zero on encode and dropped on decode.
 * - Text whose length is 1 (mod 4) cannot come from any byte string and is rejected.
 */

import { CodecError } from './codec.errors';

export const HASH64_CHARS = './0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
export const BCRYPT64_CHARS = './ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
export const AB64_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789./';
export const STD_B64_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';
export const CTA_B64_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

export type BitOrder = 'little' | 'big';

export type Base64EngineOptions = {
  charmap: string;
  bitOrder: BitOrder;
  padding?: boolean;
};

export class Base64Engine {
  readonly charmap: string;
  readonly bitOrder: BitOrder;
  readonly padding: boolean;
  private readonly index: Map<string, number>;

  constructor(opts: Base64EngineOptions) {
    if (opts.charmap.length !== 64 || new Set(opts.charmap).size !== 64) {
      throw new Error('Base64Engine: charmap must contain 64 distinct characters');
    }
    if (opts.padding && opts.charmap.includes('=')) {
      throw new Error('Base64Engine: padded charmap cannot contain "="');
    }
    this.charmap = opts.charmap;
    this.bitOrder = opts.bitOrder;
    this.padding = opts.padding ?? false;
    this.index = new Map([...opts.charmap].map((c, i) => [c, i]));
  }

  /** Number of symbols produced for `size` bytes (padding excluded). */
  encodedSize(size: number): number {
    const tail = size % 3;
    return Math.floor(size / 3) * 4 + (tail === 0 ? 0 : tail + 1);
  }

  encodeBytes(source: Uint8Array): string {
    let out = '';
    for (let offset = 0; offset < source.length; offset += 3) {
      const count = Math.min(3, source.length - offset);
      out += this.encodeGroup(source, offset, count);
    }
    if (this.padding && out.length % 4 !== 0) {
      out += '='.repeat(4 - (out.length % 4));
    }
    return out;
  }

  decodeBytes(text: string): Buffer {
    const body = this.stripPadding(text);
    if (body.length % 4 === 1) {
      throw new CodecError(`invalid encoded length: ${body.length}`);
    }

    const out: number[] = [];
    for (let offset = 0; offset < body.length; offset += 4) {
      const chunk = body.slice(offset, offset + 4);
      out.push(...this.decodeGroup(chunk));
    }
    return Buffer.from(out);
  }

  /** Encodes `source[offsets[0]], source[offsets[1]], ...` as one byte string. */
  encodeTransposedBytes(source: Uint8Array, offsets: readonly number[]): string {
    const picked = Buffer.alloc(offsets.length);
    offsets.forEach((from, to) => {
      picked[to] = source[from] ?? 0;
    });
    return this.encodeBytes(picked);
  }

  decodeTransposedBytes(text: string, offsets: readonly number[]): Buffer {
    const picked = this.decodeBytes(text);
    if (picked.length !== offsets.length) {
      throw new CodecError(`expected ${offsets.length} bytes, got ${picked.length}`);
    }
    const out = Buffer.alloc(offsets.length);
    offsets.forEach((to, from) => {
      out[to] = picked[from] ?? 0;
    });
    return out;
  }

  private encodeGroup(source: Uint8Array, offset: number, count: number): string {
    const b0 = source[offset] ?? 0;
    const b1 = count > 1 ? (source[offset + 1] ?? 0) : 0;
    const b2 = count > 2 ? (source[offset + 2] ?? 0) : 0;
    const symbols = count + 1;

    let out = '';
    if (this.bitOrder === 'little') {
      const value = b0 | (b1 << 8) | (b2 << 16);
      for (let i = 0; i < symbols; i++) {
        out += this.charmap.charAt((value >> (6 * i)) & 0x3f);
      }
    } else {
      const value = (b0 << 16) | (b1 << 8) | b2;
      for (let i = 0; i < symbols; i++) {
        out += this.charmap.charAt((value >> (18 - 6 * i)) & 0x3f);
      }
    }
    return out;
  }

  private decodeGroup(chunk: string): number[] {
    const values = [...chunk].map((c) => this.valueOf(c));
    const count = values.length - 1;

    if (this.bitOrder === 'little') {
      const value = values.reduce((acc, v, i) => acc | (v << (6 * i)), 0);
      return [value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff].slice(0, count);
    }

    const value = values.reduce((acc, v, i) => acc | (v << (18 - 6 * i)), 0);
    return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff].slice(0, count);
  }

  private valueOf(c: string): number {
    const value = this.index.get(c);
    if (value === undefined) {
      throw new CodecError(`invalid character ${JSON.stringify(c)}`);
    }
    return value;
  }

  private stripPadding(text: string): string {
    if (!this.padding) return text;
    if (text.length % 4 !== 0) {
      throw new CodecError('padded encoding must be a multiple of 4 characters');
    }
    const body = text.replace(/={1,2}$/, '');
    if (body.length % 4 === 1) {
      throw new CodecError('invalid padding');
    }
    return body;
  }
}

/** hash64 as used by md5-crypt, sha-crypt and friends. */
export const h64 = new Base64Engine({ charmap: HASH64_CHARS, bitOrder: 'little' });

/** hash64 alphabet with standard bit order. */
export const h64big = new Base64Engine({ charmap: HASH64_CHARS, bitOrder: 'big' });

/** "adapted" base64: standard base64 with `.` instead of `+`, unpadded. */
export const ab64 = new Base64Engine({ charmap: AB64_CHARS, bitOrder: 'big' });

export const bcrypt64 = new Base64Engine({ charmap: BCRYPT64_CHARS, bitOrder: 'big' });

/** Standard base64 with `-_` alt-chars and `=` padding. */
export const ctaB64 = new Base64Engine({ charmap: CTA_B64_CHARS, bitOrder: 'big', padding: true });

export const stdB64 = new Base64Engine({ charmap: STD_B64_CHARS, bitOrder: 'big', padding: true });
