/**
 * src/modules/handlers/schemes/bcrypt.ts
 *
 * WHY:
 * - bcrypt hashes are the most common thing found in existing user tables.
 * - The digest itself comes from the `bcrypt` package; this file only owns the format.
 *
 * FORMAT:
 *   $2b$<2-digit log2 rounds>$<22-char salt><31-char checksum>
 *
 * RULES:
 * - $2a$ and $2y$ hashes are accepted and keep their ident when re-rendered.
 * - The last salt char only carries 2 bits; salts are rewritten so the unused bits are zero.
 */

import bcrypt from 'bcrypt';
import { bcrypt64, BCRYPT64_CHARS } from '../../codecs/base64-engine';
import { CodecError } from '../../codecs/codec.errors';
import { charSalt } from '../capabilities/salt';
import { log2Rounds } from '../capabilities/rounds';
import { GenericHandler, type HandlerDeps } from '../generic-handler';
import type { HashFormat, HashRecord } from '../handler.types';

const IDENTS = ['$2b$', '$2a$', '$2y$'] as const;
const SALT_CHARS = 22;
const CHECKSUM_CHARS = 31;
const CHECKSUM_SIZE = 23;

const BODY_PATTERN = /^([0-9]{2})\$([./A-Za-z0-9]{22})([./A-Za-z0-9]{31})?$/;

function formatRounds(rounds: number): string {
  return rounds.toString().padStart(2, '0');
}

function canonicalSalt(salt: string): string {
  if (salt.length !== SALT_CHARS) return salt;
  return bcrypt64.encodeBytes(bcrypt64.decodeBytes(salt));
}

const bcryptFormat: HashFormat<string> = {
  parse(hash: string): HashRecord<string> {
    const ident = IDENTS.find((candidate) => hash.startsWith(candidate));
    if (ident === undefined) {
      throw new CodecError('unrecognized identifier');
    }

    const match = BODY_PATTERN.exec(hash.slice(ident.length));
    const [, rounds, salt, checksum] = match ?? [];
    if (rounds === undefined || salt === undefined) {
      throw new CodecError('malformed bcrypt hash');
    }

    return {
      ident,
      salt,
      rounds: Number.parseInt(rounds, 10),
      implicitRounds: false,
      checksum: checksum === undefined ? undefined : bcrypt64.decodeBytes(checksum),
    };
  },

  render(record: HashRecord<string>): string {
    const ident = record.ident ?? IDENTS[0];
    const checksum = record.checksum === undefined ? '' : bcrypt64.encodeBytes(record.checksum);
    return `${ident}${formatRounds(record.rounds)}$${record.salt}${checksum}`;
  },
};

export function createBcryptHandler(deps?: HandlerDeps): GenericHandler<string> {
  return new GenericHandler<string>(
    {
      name: 'bcrypt',
      description: 'bcrypt (Blowfish), via the bcrypt package',
      idents: IDENTS,
      settingKeywords: ['salt', 'rounds'],
      salt: charSalt({ maxSize: SALT_CHARS, charset: BCRYPT64_CHARS, canonicalize: canonicalSalt }),
      rounds: log2Rounds({ min: 4, max: 31, default: 12 }),
      checksumSize: CHECKSUM_SIZE,
      format: bcryptFormat,
      digest: ({ secret, salt, rounds }) => {
        // The native binding understands $2a$/$2b$ only; the variants hash identically here.
        const hash = bcrypt.hashSync(secret, `$2b$${formatRounds(rounds)}$${salt}`);
        return bcrypt64.decodeBytes(hash.slice(-CHECKSUM_CHARS));
      },
    },
    deps,
  );
}

export const bcryptHandler = createBcryptHandler();
