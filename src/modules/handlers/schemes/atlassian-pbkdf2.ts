/**
 * src/modules/handlers/schemes/atlassian-pbkdf2.ts
 *
 *   {PKCS5S2}<base64(16-byte salt || 32-byte checksum)>
 *
 * Rounds are fixed at 10000 and never written. The format has no config form, so a
 * config renders with an all-zero checksum and parses back as a config.
 */

import { stdB64 } from '../../codecs/base64-engine';
import { CodecError } from '../../codecs/codec.errors';
import { byteSalt } from '../capabilities/salt';
import { fixedRounds } from '../capabilities/rounds';
import { pbkdf2 } from '../digest/pbkdf2';
import { GenericHandler, type HandlerDeps } from '../generic-handler';
import type { HashFormat, HashRecord } from '../handler.types';

const IDENT = '{PKCS5S2}';
const SALT_SIZE = 16;
const CHECKSUM_SIZE = 32;
const ROUNDS = 10000;

const atlassianFormat: HashFormat<Buffer> = {
  parse(hash: string): HashRecord<Buffer> {
    if (!hash.startsWith(IDENT)) {
      throw new CodecError('unrecognized identifier');
    }
    const data = stdB64.decodeBytes(hash.slice(IDENT.length));
    if (data.length !== SALT_SIZE + CHECKSUM_SIZE) {
      throw new CodecError(`expected ${SALT_SIZE + CHECKSUM_SIZE} bytes, got ${data.length}`);
    }

    const checksum = data.subarray(SALT_SIZE);
    return {
      salt: data.subarray(0, SALT_SIZE),
      rounds: ROUNDS,
      implicitRounds: true,
      checksum: checksum.every((byte) => byte === 0) ? undefined : checksum,
    };
  },

  render(record: HashRecord<Buffer>): string {
    const checksum = record.checksum ?? Buffer.alloc(CHECKSUM_SIZE);
    return IDENT + stdB64.encodeBytes(Buffer.concat([record.salt, checksum]));
  },
};

export function createAtlassianPbkdf2Sha1(deps?: HandlerDeps): GenericHandler<Buffer> {
  return new GenericHandler<Buffer>(
    {
      name: 'atlassian_pbkdf2_sha1',
      description: 'PBKDF2-HMAC-SHA1, Atlassian layout',
      idents: [IDENT],
      settingKeywords: ['salt'],
      salt: byteSalt({ minSize: SALT_SIZE, maxSize: SALT_SIZE }),
      rounds: fixedRounds(ROUNDS),
      checksumSize: CHECKSUM_SIZE,
      format: atlassianFormat,
      digest: ({ secret, salt }) => pbkdf2(secret, salt, ROUNDS, CHECKSUM_SIZE, 'sha1'),
    },
    deps,
  );
}

export const atlassianPbkdf2Sha1 = createAtlassianPbkdf2Sha1();
