/**
 * src/modules/handlers/schemes/cta-pbkdf2.ts
 *
 *   $p5k2$<hex rounds>$<base64 salt>$<base64 checksum>
 *
 * Base64 here is the "-_" alphabet with "=" padding, for both salt and checksum.
 */

import { ctaB64 } from '../../codecs/base64-engine';
import { FieldGrammar } from '../../codecs/field-grammar';
import { byteSalt } from '../capabilities/salt';
import { linearRounds } from '../capabilities/rounds';
import { PBKDF2_MAX_ROUNDS, pbkdf2 } from '../digest/pbkdf2';
import { bytesField, fieldFormat } from '../formats/field-format';
import { GenericHandler, type HandlerDeps } from '../generic-handler';

export function createCtaPbkdf2Sha1(deps?: HandlerDeps): GenericHandler<Buffer> {
  const grammar = new FieldGrammar({ ident: '$p5k2$', roundsBase: 16 });

  return new GenericHandler<Buffer>(
    {
      name: 'cta_pbkdf2_sha1',
      description: 'PBKDF2-HMAC-SHA1, Cryptacular layout',
      idents: ['$p5k2$'],
      settingKeywords: ['salt', 'saltSize', 'rounds'],
      salt: byteSalt({ minSize: 0, maxSize: 1024, defaultSize: 16 }),
      rounds: linearRounds({ min: 1, max: PBKDF2_MAX_ROUNDS, default: 10000 }),
      checksumSize: 20,
      format: fieldFormat({ grammar, salt: bytesField(ctaB64), checksum: bytesField(ctaB64) }),
      digest: ({ secret, salt, rounds }) => pbkdf2(secret, salt, rounds, 20, 'sha1'),
    },
    deps,
  );
}

export const ctaPbkdf2Sha1 = createCtaPbkdf2Sha1();
