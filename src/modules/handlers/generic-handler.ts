/**
 * src/modules/handlers/generic-handler.ts
 *
 * WHY:
 * - Every scheme does the same dance: parse -> normalize -> digest -> render -> compare.
 * - Schemes only describe themselves (HandlerSpec); this class runs the dance.
 *
 * HOW TO USE:
 * - const handler = new GenericHandler({ name, idents, salt, rounds, format, digest, ... })
 * - handler.encrypt('secret', { rounds: 1000 })
 * - handler.verify('secret', hash)
 *
 * RULES:
 * - CodecError never leaves this class; it becomes INVALID_HASH.
 * - A stored hash is normalized strictly (out-of-range => INVALID_HASH).
 *   A config string is normalized relaxed.
 * - Checksums are compared as decoded bytes, in constant time.
 */

import { timingSafeEqual } from 'node:crypto';
import { isPasshashError } from '../../shared/errors/errors';
import { cryptoRandom, type RandomSource } from '../../shared/security/random';
import { CodecError } from '../codecs/codec.errors';
import { HandlerErrors } from './handler.errors';
import type {
  HandlerSpec,
  HashContext,
  HashOptions,
  HashRecord,
  PasswordHandler,
  RoundsCapability,
  Salt,
  SaltCapability,
  Secret,
  SettingKeyword,
} from './handler.types';
import { normalizeRounds, normalizeSalt, validateHandlerSpec } from './policies/setting-bounds.policy';

export type HandlerDeps = {
  random?: RandomSource;
};

export class GenericHandler<TSalt extends Salt> implements PasswordHandler {
  readonly name: string;
  readonly description: string;
  readonly idents: readonly string[];
  readonly settingKeywords: readonly SettingKeyword[];
  readonly contextKeywords: readonly string[];
  readonly rounds: RoundsCapability;
  readonly salt: SaltCapability<TSalt>;
  readonly checksumSize: number;

  private readonly spec: HandlerSpec<TSalt>;
  private readonly random: RandomSource;

  constructor(spec: HandlerSpec<TSalt>, deps: HandlerDeps = {}) {
    validateHandlerSpec(spec);

    this.spec = spec;
    this.random = deps.random ?? cryptoRandom;
    this.name = spec.name;
    this.description = spec.description;
    this.idents = Object.freeze([...spec.idents]);
    this.settingKeywords = Object.freeze([...spec.settingKeywords]);
    this.contextKeywords = Object.freeze([...(spec.contextKeywords ?? [])]);
    this.rounds = spec.rounds;
    this.salt = spec.salt;
    this.checksumSize = spec.checksumSize;
  }

  identify(hash: string | null | undefined): boolean {
    if (!hash) return false;
    if (!this.idents.some((ident) => hash.startsWith(ident))) return false;

    try {
      this.fromString(hash);
      return true;
    } catch (err) {
      if (isPasshashError(err, 'INVALID_HASH')) return false;
      throw err;
    }
  }

  fromString(hash: string): HashRecord<TSalt> {
    let parsed: HashRecord<TSalt>;
    try {
      parsed = this.spec.format.parse(hash);
    } catch (err) {
      if (err instanceof CodecError) {
        throw HandlerErrors.invalidHash(this.name, err.message, err);
      }
      throw err;
    }

    if (parsed.checksum !== undefined && parsed.checksum.length !== this.checksumSize) {
      throw HandlerErrors.invalidHash(
        this.name,
        `checksum must be ${this.checksumSize} bytes, got ${parsed.checksum.length}`,
      );
    }

    // A full hash must already be within bounds; a config may be corrected.
    const strict = parsed.checksum !== undefined;
    try {
      return {
        ident: parsed.ident,
        salt: normalizeSalt(parsed.salt, this.salt, {
          scheme: this.name,
          strict,
          useDefaults: false,
        }),
        rounds: normalizeRounds(parsed.rounds, this.rounds, {
          scheme: this.name,
          strict,
          useDefaults: false,
        }),
        implicitRounds: parsed.implicitRounds,
        checksum: parsed.checksum,
      };
    } catch (err) {
      if (isPasshashError(err, 'SETTING_OUT_OF_RANGE')) {
        throw HandlerErrors.invalidHash(this.name, err.message, err);
      }
      throw err;
    }
  }

  render(record: HashRecord): string {
    return this.spec.format.render(this.coerce(record));
  }

  computeChecksum(secret: Secret, record: HashRecord, context: HashContext = {}): Buffer {
    for (const keyword of this.contextKeywords) {
      if (context[keyword] === undefined) {
        throw HandlerErrors.missingContext(this.name, keyword);
      }
    }

    const settings = this.coerce(record);
    return this.spec.digest({
      secret: typeof secret === 'string' ? Buffer.from(secret, 'utf8') : secret,
      salt: settings.salt,
      rounds: settings.rounds,
      config: this.spec.format.render({
        ident: settings.ident,
        salt: settings.salt,
        rounds: settings.rounds,
        implicitRounds: settings.implicitRounds,
      }),
      context,
    });
  }

  genconfig(options: HashOptions = {}): string {
    this.assertAccepted(options, 'salt');
    this.assertAccepted(options, 'saltSize');
    this.assertAccepted(options, 'rounds');

    const strict = options.strict ?? false;
    const salt = normalizeSalt(options.salt, this.salt, {
      scheme: this.name,
      strict,
      saltSize: options.saltSize,
      random: options.random ?? this.random,
    });
    const rounds = normalizeRounds(options.rounds, this.rounds, { scheme: this.name, strict });

    return this.spec.format.render({
      salt,
      rounds,
      implicitRounds: options.implicitRounds ?? true,
    });
  }

  genhash(secret: Secret, config: string, context?: HashContext): string {
    const record = this.fromString(config);
    const checksum = this.computeChecksum(secret, record, context);
    return this.spec.format.render({ ...record, checksum });
  }

  encrypt(secret: Secret, options?: HashOptions, context?: HashContext): string {
    return this.genhash(secret, this.genconfig(options), context);
  }

  verify(secret: Secret, hash: string, context?: HashContext): boolean {
    const record = this.fromString(hash);
    if (record.checksum === undefined) {
      throw HandlerErrors.missingChecksum(this.name);
    }

    const expected = this.computeChecksum(secret, record, context);
    return expected.length === record.checksum.length && timingSafeEqual(expected, record.checksum);
  }

  private assertAccepted(options: HashOptions, keyword: SettingKeyword): void {
    if (options[keyword] !== undefined && !this.settingKeywords.includes(keyword)) {
      throw HandlerErrors.unsupportedSetting(this.name, keyword);
    }
  }

  private coerce(record: HashRecord): HashRecord<TSalt> {
    return {
      ident: record.ident,
      salt: this.salt.accept(record.salt, this.name),
      rounds: record.rounds,
      implicitRounds: record.implicitRounds,
      checksum: record.checksum,
    };
  }
}
