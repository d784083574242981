import { CodecError } from './codec.errors';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/** Hex codec; decoding accepts either case, encoding uses `letterCase`. */
export function createHexCodec(letterCase: 'upper' | 'lower' = 'lower') {
  return {
    encodeBytes(source: Uint8Array): string {
      const hex = Buffer.from(source).toString('hex');
      return letterCase === 'upper' ? hex.toUpperCase() : hex;
    },

    decodeBytes(text: string): Buffer {
      if (!HEX_PATTERN.test(text)) {
        throw new CodecError('invalid hex string');
      }
      return Buffer.from(text, 'hex');
    },
  };
}

export const upperHex = createHexCodec('upper');
