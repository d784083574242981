/**
 * src/modules/handlers/formats/field-format.ts
 *
 * WHY:
 * - Binds a FieldGrammar (field layout) to the text codecs a scheme uses for its salt
 *   and checksum fields, producing a HashFormat the GenericHandler consumes.
 *
 * HOW TO USE:
 * - fieldFormat({ grammar, salt: bytesField(ab64), checksum: bytesField(ab64) })
 */

import type { Base64Engine } from '../../codecs/base64-engine';
import type { FieldGrammar } from '../../codecs/field-grammar';
import type { HashFormat, HashRecord, Salt } from '../handler.types';

export interface TextCodec<T> {
  decode(text: string): T;
  encode(value: T): string;
}

export type BytesCodec = {
  encodeBytes(source: Uint8Array): string;
  decodeBytes(text: string): Buffer;
};

export function bytesField(codec: BytesCodec): TextCodec<Buffer> {
  return {
    decode: (text) => codec.decodeBytes(text),
    encode: (value) => codec.encodeBytes(value),
  };
}

/** Salt kept exactly as written; charset checks happen in the normalizer. */
export const charsField: TextCodec<string> = {
  decode: (text) => text,
  encode: (value) => value,
};

export function transposedField(engine: Base64Engine, offsets: readonly number[]): TextCodec<Buffer> {
  return {
    decode: (text) => engine.decodeTransposedBytes(text, offsets),
    encode: (value) => engine.encodeTransposedBytes(value, offsets),
  };
}

export function fieldFormat<TSalt extends Salt>(opts: {
  grammar: FieldGrammar;
  salt: TextCodec<TSalt>;
  checksum: TextCodec<Buffer>;
}): HashFormat<TSalt> {
  const { grammar, salt, checksum } = opts;

  return {
    parse(hash: string): HashRecord<TSalt> {
      const fields = grammar.parse(hash);
      return {
        ident: fields.ident,
        salt: salt.decode(fields.salt),
        rounds: fields.rounds,
        implicitRounds: fields.implicitRounds,
        checksum: fields.checksum === undefined ? undefined : checksum.decode(fields.checksum),
      };
    },

    render(record: HashRecord<TSalt>): string {
      return grammar.render(
        {
          rounds: record.rounds,
          implicitRounds: record.implicitRounds,
          salt: salt.encode(record.salt),
          checksum: record.checksum === undefined ? undefined : checksum.encode(record.checksum),
        },
        record.ident,
      );
    },
  };
}
