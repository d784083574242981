/**
 * src/modules/codecs/field-grammar.ts
 *
 * WHY:
 * - Most modular-crypt formats share one shape:
 *     <ident>[<rounds-prefix><rounds><sep>]<salt>[<sep><checksum>]
 * - Schemes differ only in ident, separator, rounds base, and how an omitted
 *   rounds field is treated. This class captures those knobs in one place.
 *
 * RULES:
 * - Zero-padded rounds ("010") are malformed. A lone "0" parses as 0.
 * - Positional rounds (no prefix) may be left empty only when `implicitRounds` is set.
 * - Prefixed rounds ("rounds=N$") may be absent entirely; absent => implicit default.
 * - A missing or empty checksum field yields a config, not an error.
 * - Salt content is NOT validated here; handlers run the setting normalizer for that.
 *
 * OMITTING ROUNDS ON RENDER:
 * - 'when-implicit': omit only if the value equals the implicit default AND the record
 *   says it was implicit (sha-crypt: an explicit "rounds=5000" stays explicit).
 * - 'when-default': omit whenever the value equals the implicit default
 *   (dlitz: 400 is never written).
 */

import { CodecError } from './codec.errors';

export type RoundsOmission = 'when-implicit' | 'when-default';

export type FieldGrammarOptions = {
  ident: string | readonly string[];
  separator?: string;
  roundsBase?: 10 | 16;
  roundsPrefix?: string;
  implicitRounds?: number;
  omitRounds?: RoundsOmission;
};

export type ParsedFields = {
  ident: string;
  rounds: number;
  implicitRounds: boolean;
  salt: string;
  checksum?: string;
};

export type RenderFields = {
  rounds: number;
  implicitRounds?: boolean;
  salt: string;
  checksum?: string;
};

const DIGITS: Record<10 | 16, RegExp> = {
  10: /^[0-9]+$/,
  16: /^[0-9a-fA-F]+$/,
};

export class FieldGrammar {
  readonly idents: readonly string[];
  readonly separator: string;
  readonly roundsBase: 10 | 16;
  readonly roundsPrefix?: string;
  readonly implicitRounds?: number;
  readonly omitRounds: RoundsOmission;

  constructor(opts: FieldGrammarOptions) {
    this.idents = typeof opts.ident === 'string' ? [opts.ident] : [...opts.ident];
    if (this.idents.length === 0) {
      throw new Error('FieldGrammar: at least one ident is required');
    }
    this.separator = opts.separator ?? '$';
    this.roundsBase = opts.roundsBase ?? 10;
    this.roundsPrefix = opts.roundsPrefix;
    this.implicitRounds = opts.implicitRounds;
    this.omitRounds = opts.omitRounds ?? 'when-implicit';
  }

  /** Ident used when rendering. */
  get primaryIdent(): string {
    return this.idents[0] ?? '';
  }

  matchIdent(text: string): string | undefined {
    return this.idents.find((ident) => text.startsWith(ident));
  }

  parse(text: string): ParsedFields {
    const ident = this.matchIdent(text);
    if (ident === undefined) {
      throw new CodecError('unrecognized identifier');
    }

    const sep = this.separator;
    let rest = text.slice(ident.length);
    let token: string | undefined;

    if (this.roundsPrefix !== undefined) {
      if (rest.startsWith(this.roundsPrefix)) {
        const end = rest.indexOf(sep, this.roundsPrefix.length);
        if (end < 0) throw new CodecError('unterminated rounds field');
        token = rest.slice(this.roundsPrefix.length, end);
        if (token === '') throw new CodecError('empty rounds field');
        rest = rest.slice(end + sep.length);
      }
    } else {
      const end = rest.indexOf(sep);
      if (end < 0) throw new CodecError('missing rounds field');
      token = rest.slice(0, end);
      rest = rest.slice(end + sep.length);
    }

    const parts = rest.split(sep);
    if (parts.length > 2) {
      throw new CodecError('too many fields');
    }
    const salt = parts[0] ?? '';
    const checksum = parts[1] ? parts[1] : undefined;

    if (token === undefined || token === '') {
      if (this.implicitRounds === undefined) {
        throw new CodecError('missing rounds field');
      }
      return { ident, rounds: this.implicitRounds, implicitRounds: true, salt, checksum };
    }

    return { ident, rounds: this.parseRounds(token), implicitRounds: false, salt, checksum };
  }

  render(fields: RenderFields, ident: string = this.primaryIdent): string {
    const sep = this.separator;
    const omit = this.shouldOmitRounds(fields);

    let roundsField: string;
    if (this.roundsPrefix !== undefined) {
      roundsField = omit ? '' : `${this.roundsPrefix}${this.formatRounds(fields.rounds)}${sep}`;
    } else {
      roundsField = `${omit ? '' : this.formatRounds(fields.rounds)}${sep}`;
    }

    const checksumField = fields.checksum === undefined ? '' : `${sep}${fields.checksum}`;
    return `${ident}${roundsField}${fields.salt}${checksumField}`;
  }

  private shouldOmitRounds(fields: RenderFields): boolean {
    if (this.implicitRounds === undefined || fields.rounds !== this.implicitRounds) {
      return false;
    }
    return this.omitRounds === 'when-default' || fields.implicitRounds === true;
  }

  private parseRounds(token: string): number {
    if (!DIGITS[this.roundsBase].test(token)) {
      throw new CodecError('malformed rounds field');
    }
    if (token.length > 1 && token.startsWith('0')) {
      throw new CodecError('zero-padded rounds field');
    }
    const rounds = Number.parseInt(token, this.roundsBase);
    if (!Number.isSafeInteger(rounds)) {
      throw new CodecError('rounds field out of range');
    }
    return rounds;
  }

  private formatRounds(rounds: number): string {
    return rounds.toString(this.roundsBase);
  }
}
