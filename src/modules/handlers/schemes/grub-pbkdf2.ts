/**
 * src/modules/handlers/schemes/grub-pbkdf2.ts
 *
 *   grub.pbkdf2.sha512.<rounds>.<HEX salt>.<HEX checksum>
 */

import { FieldGrammar } from '../../codecs/field-grammar';
import { upperHex } from '../../codecs/hex';
import { byteSalt } from '../capabilities/salt';
import { linearRounds } from '../capabilities/rounds';
import { PBKDF2_MAX_ROUNDS, pbkdf2 } from '../digest/pbkdf2';
import { bytesField, fieldFormat } from '../formats/field-format';
import { GenericHandler, type HandlerDeps } from '../generic-handler';

export function createGrubPbkdf2Sha512(deps?: HandlerDeps): GenericHandler<Buffer> {
  const grammar = new FieldGrammar({ ident: 'grub.pbkdf2.sha512.', separator: '.' });

  return new GenericHandler<Buffer>(
    {
      name: 'grub_pbkdf2_sha512',
      description: 'PBKDF2-HMAC-SHA512, GRUB2 layout',
      idents: ['grub.pbkdf2.sha512.'],
      settingKeywords: ['salt', 'saltSize', 'rounds'],
      salt: byteSalt({ minSize: 0, maxSize: 1024, defaultSize: 64 }),
      rounds: linearRounds({ min: 1, max: PBKDF2_MAX_ROUNDS, default: 10000 }),
      checksumSize: 64,
      format: fieldFormat({ grammar, salt: bytesField(upperHex), checksum: bytesField(upperHex) }),
      digest: ({ secret, salt, rounds }) => pbkdf2(secret, salt, rounds, 64, 'sha512'),
    },
    deps,
  );
}

export const grubPbkdf2Sha512 = createGrubPbkdf2Sha512();
