/**
 * src/modules/handlers/schemes/sha-crypt.ts
 *
 *   $5$[rounds=<n>$]<salt>$<checksum>   (SHA-256)
 *   $6$[rounds=<n>$]<salt>$<checksum>   (SHA-512)
 *
 * An absent rounds field means 5000. A hash that spelled out "rounds=5000" keeps it
 * when re-rendered; freshly generated configs at 5000 leave it out.
 */

import { h64, HASH64_CHARS } from '../../codecs/base64-engine';
import { FieldGrammar } from '../../codecs/field-grammar';
import { charSalt } from '../capabilities/salt';
import { linearRounds } from '../capabilities/rounds';
import { shaCryptDigest, type ShaCryptDigest } from '../digest/sha-crypt';
import { charsField, fieldFormat, transposedField } from '../formats/field-format';
import { GenericHandler, type HandlerDeps } from '../generic-handler';

const SHA256_OFFSETS = [
  20, 10, 0, 11, 1, 21, 2, 22, 12, 23, 13, 3, 14, 4, 24, 5, 25, 15, 26, 16, 6, 17, 7, 27, 8, 28, 18,
  29, 19, 9, 30, 31,
] as const;

const SHA512_OFFSETS = [
  42, 21, 0, 1, 43, 22, 23, 2, 44, 45, 24, 3, 4, 46, 25, 26, 5, 47, 48, 27, 6, 7, 49, 28, 29, 8, 50,
  51, 30, 9, 10, 52, 31, 32, 11, 53, 54, 33, 12, 13, 55, 34, 35, 14, 56, 57, 36, 15, 16, 58, 37, 38,
  17, 59, 60, 39, 18, 19, 61, 40, 41, 20, 62, 63,
] as const;

export const SHA_CRYPT_IMPLICIT_ROUNDS = 5000;

// Stored hashes from other crypt(3) implementations may use any salt character but these.
const SALT_FORBIDDEN_CHARS = ':$\n';

type ShaCryptVariant = {
  name: string;
  ident: string;
  digest: ShaCryptDigest;
  checksumSize: number;
  offsets: readonly number[];
};

export function createShaCryptHandler(
  variant: ShaCryptVariant,
  deps?: HandlerDeps,
): GenericHandler<string> {
  const grammar = new FieldGrammar({
    ident: variant.ident,
    roundsPrefix: 'rounds=',
    implicitRounds: SHA_CRYPT_IMPLICIT_ROUNDS,
    omitRounds: 'when-implicit',
  });

  return new GenericHandler<string>(
    {
      name: variant.name,
      description: `${variant.digest.toUpperCase()}-crypt`,
      idents: [variant.ident],
      settingKeywords: ['salt', 'saltSize', 'rounds'],
      salt: charSalt({
        minSize: 0,
        maxSize: 16,
        defaultSize: 16,
        charset: HASH64_CHARS,
        forbiddenChars: SALT_FORBIDDEN_CHARS,
      }),
      rounds: linearRounds({ min: 1000, max: 999_999_999, default: 40000 }),
      checksumSize: variant.checksumSize,
      format: fieldFormat({
        grammar,
        salt: charsField,
        checksum: transposedField(h64, variant.offsets),
      }),
      digest: ({ secret, salt, rounds }) => shaCryptDigest(variant.digest, secret, salt, rounds),
    },
    deps,
  );
}

export const sha256Crypt = createShaCryptHandler({
  name: 'sha256_crypt',
  ident: '$5$',
  digest: 'sha256',
  checksumSize: 32,
  offsets: SHA256_OFFSETS,
});

export const sha512Crypt = createShaCryptHandler({
  name: 'sha512_crypt',
  ident: '$6$',
  digest: 'sha512',
  checksumSize: 64,
  offsets: SHA512_OFFSETS,
});
