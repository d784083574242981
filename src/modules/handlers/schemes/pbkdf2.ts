/**
 * src/modules/handlers/schemes/pbkdf2.ts
 *
 * PBKDF2-HMAC in modular-crypt form:
 *   $pbkdf2-sha256$<rounds>$<ab64 salt>$<ab64 checksum>
 *
 * One factory produces the SHA-1/256/512 variants; the LDAP variants wrap them
 * under "{PBKDF2...}" prefixes.
 */

import { ab64 } from '../../codecs/base64-engine';
import { FieldGrammar } from '../../codecs/field-grammar';
import { byteSalt } from '../capabilities/salt';
import { linearRounds } from '../capabilities/rounds';
import { PBKDF2_MAX_ROUNDS, pbkdf2, type Pbkdf2Digest } from '../digest/pbkdf2';
import { bytesField, fieldFormat } from '../formats/field-format';
import { GenericHandler, type HandlerDeps } from '../generic-handler';
import { PrefixWrapper } from '../prefix-wrapper';

export type Pbkdf2HandlerOptions = {
  name: string;
  ident: string;
  digest: Pbkdf2Digest;
  checksumSize: number;
  defaultRounds?: number;
};

export function createPbkdf2Handler(
  opts: Pbkdf2HandlerOptions,
  deps?: HandlerDeps,
): GenericHandler<Buffer> {
  const grammar = new FieldGrammar({ ident: opts.ident });

  return new GenericHandler<Buffer>(
    {
      name: opts.name,
      description: `PBKDF2-HMAC-${opts.digest.toUpperCase()}`,
      idents: [opts.ident],
      settingKeywords: ['salt', 'saltSize', 'rounds'],
      salt: byteSalt({ minSize: 0, maxSize: 1024, defaultSize: 16 }),
      rounds: linearRounds({ min: 1, max: PBKDF2_MAX_ROUNDS, default: opts.defaultRounds ?? 6400 }),
      checksumSize: opts.checksumSize,
      format: fieldFormat({ grammar, salt: bytesField(ab64), checksum: bytesField(ab64) }),
      digest: ({ secret, salt, rounds }) =>
        pbkdf2(secret, salt, rounds, opts.checksumSize, opts.digest),
    },
    deps,
  );
}

export const pbkdf2Sha1 = createPbkdf2Handler({
  name: 'pbkdf2_sha1',
  ident: '$pbkdf2$',
  digest: 'sha1',
  checksumSize: 20,
});

export const pbkdf2Sha256 = createPbkdf2Handler({
  name: 'pbkdf2_sha256',
  ident: '$pbkdf2-sha256$',
  digest: 'sha256',
  checksumSize: 32,
});

export const pbkdf2Sha512 = createPbkdf2Handler({
  name: 'pbkdf2_sha512',
  ident: '$pbkdf2-sha512$',
  digest: 'sha512',
  checksumSize: 64,
});

export const ldapPbkdf2Sha1 = new PrefixWrapper({
  name: 'ldap_pbkdf2_sha1',
  wrapped: pbkdf2Sha1,
  prefix: '{PBKDF2}',
  originalPrefix: '$pbkdf2$',
});

export const ldapPbkdf2Sha256 = new PrefixWrapper({
  name: 'ldap_pbkdf2_sha256',
  wrapped: pbkdf2Sha256,
  prefix: '{PBKDF2-SHA256}',
  originalPrefix: '$pbkdf2-sha256$',
});

export const ldapPbkdf2Sha512 = new PrefixWrapper({
  name: 'ldap_pbkdf2_sha512',
  wrapped: pbkdf2Sha512,
  prefix: '{PBKDF2-SHA512}',
  originalPrefix: '$pbkdf2-sha512$',
});
