/**
 * src/modules/handlers/schemes/dlitz-pbkdf2.ts
 *
 *   $p5k2$[<hex rounds>]$<salt>$<ab64 checksum>
 *
 * The rounds field is left empty when it equals 400. The PBKDF2 salt is the whole
 * config string, not just the salt field.
 */

import { ab64, HASH64_CHARS } from '../../codecs/base64-engine';
import { FieldGrammar } from '../../codecs/field-grammar';
import { charSalt } from '../capabilities/salt';
import { linearRounds } from '../capabilities/rounds';
import { PBKDF2_MAX_ROUNDS, pbkdf2 } from '../digest/pbkdf2';
import { bytesField, charsField, fieldFormat } from '../formats/field-format';
import { GenericHandler, type HandlerDeps } from '../generic-handler';

export function createDlitzPbkdf2Sha1(deps?: HandlerDeps): GenericHandler<string> {
  const grammar = new FieldGrammar({
    ident: '$p5k2$',
    roundsBase: 16,
    implicitRounds: 400,
    omitRounds: 'when-default',
  });

  return new GenericHandler<string>(
    {
      name: 'dlitz_pbkdf2_sha1',
      description: 'PBKDF2-HMAC-SHA1, Dwayne Litzenberger layout',
      idents: ['$p5k2$'],
      settingKeywords: ['salt', 'saltSize', 'rounds'],
      salt: charSalt({ minSize: 0, maxSize: 1024, defaultSize: 16, charset: HASH64_CHARS }),
      rounds: linearRounds({ min: 1, max: PBKDF2_MAX_ROUNDS, default: 10000 }),
      checksumSize: 24,
      format: fieldFormat({ grammar, salt: charsField, checksum: bytesField(ab64) }),
      digest: ({ secret, rounds, config }) => pbkdf2(secret, config, rounds, 24, 'sha1'),
    },
    deps,
  );
}

export const dlitzPbkdf2Sha1 = createDlitzPbkdf2Sha1();
