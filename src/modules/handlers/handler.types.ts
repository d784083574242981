import type { RandomSource } from '../../shared/security/random';

export type Secret = string | Buffer;
export type Salt = Buffer | string;

export type SettingKeyword = 'salt' | 'saltSize' | 'rounds';
export type RoundsCost = 'linear' | 'log2';

/** Extra per-call values some schemes mix into the digest (e.g. a username or realm). */
export type HashContext = Readonly<Record<string, string>>;

export type RoundsCapability = {
  readonly minRounds: number;
  readonly maxRounds: number;
  readonly defaultRounds: number;
  readonly cost: RoundsCost;
  /** Below-minimum values raise even in relaxed mode. */
  readonly strictBounds?: boolean;
};

export interface SaltCapability<TSalt extends Salt> {
  readonly kind: 'bytes' | 'chars';
  readonly minSize: number;
  readonly maxSize: number;
  readonly defaultSize: number;
  /** Allowed characters (chars salts only). */
  readonly charset?: string;
  /** Characters drawn when generating a salt (chars salts only). */
  readonly defaultCharset?: string;
  /** When set, salts may hold any character except these (chars salts only). */
  readonly forbiddenChars?: string;

  /** Converts a caller- or parser-supplied salt to this kind; throws SETTING_OUT_OF_RANGE. */
  accept(value: Salt, scheme: string): TSalt;
  sizeOf(salt: TSalt): number;
  truncate(salt: TSalt, size: number): TSalt;
  generate(size: number, random: RandomSource): TSalt;
  /** Rewrites a salt into its canonical spelling, if the scheme has one. */
  canonical?(salt: TSalt): TSalt;
}

/** Parsed or generated settings. With `checksum` it is a hash; without, a config. */
export type HashRecord<TSalt extends Salt = Salt> = {
  /** Matched ident for schemes with several; rendering falls back to the primary one. */
  readonly ident?: string;
  readonly salt: TSalt;
  readonly rounds: number;
  readonly implicitRounds: boolean;
  readonly checksum?: Buffer;
};

/** Settings a caller (or a policy) asks for when generating a config. */
export type HashOptions = {
  salt?: Salt;
  saltSize?: number;
  rounds?: number;
  /** Lets formats with an implicit default omit the rounds field (defaults to true). */
  implicitRounds?: boolean;
  /** Raise instead of correcting out-of-range settings. */
  strict?: boolean;
  /** Source for generated salts; the handler's own source when omitted. */
  random?: RandomSource;
};

export type DigestInput<TSalt extends Salt> = {
  secret: Buffer;
  salt: TSalt;
  rounds: number;
  /** The record rendered without its checksum. */
  config: string;
  context: HashContext;
};

/** The digest kernel a handler delegates to: (secret, salt, cost) -> checksum bytes. */
export type DigestProvider<TSalt extends Salt> = (input: DigestInput<TSalt>) => Buffer;

/**
 * Textual codec for one scheme. `parse` returns raw (un-normalized) values and throws
 * CodecError on malformed text; `render` omits the checksum when it is absent.
 */
export interface HashFormat<TSalt extends Salt> {
  parse(hash: string): HashRecord<TSalt>;
  render(record: HashRecord<TSalt>): string;
}

export type HandlerSpec<TSalt extends Salt> = {
  name: string;
  description: string;
  idents: readonly string[];
  settingKeywords: readonly SettingKeyword[];
  contextKeywords?: readonly string[];
  salt: SaltCapability<TSalt>;
  rounds: RoundsCapability;
  checksumSize: number;
  format: HashFormat<TSalt>;
  digest: DigestProvider<TSalt>;
};

/**
 * Capability contract every scheme satisfies. The registry, policy and context only
 * ever see this interface.
 */
export interface PasswordHandler {
  readonly name: string;
  readonly description: string;
  readonly idents: readonly string[];
  readonly settingKeywords: readonly SettingKeyword[];
  readonly contextKeywords: readonly string[];
  readonly rounds: RoundsCapability;
  readonly checksumSize: number;

  identify(hash: string | null | undefined): boolean;
  fromString(hash: string): HashRecord;
  render(record: HashRecord): string;
  computeChecksum(secret: Secret, record: HashRecord, context?: HashContext): Buffer;
  genconfig(options?: HashOptions): string;
  genhash(secret: Secret, config: string, context?: HashContext): string;
  encrypt(secret: Secret, options?: HashOptions, context?: HashContext): string;
  verify(secret: Secret, hash: string, context?: HashContext): boolean;
}

export function acceptsSetting(handler: PasswordHandler, keyword: SettingKeyword): boolean {
  return handler.settingKeywords.includes(keyword);
}

export function isPasswordHandler(value: unknown): value is PasswordHandler {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'identify' in value &&
    typeof value.identify === 'function' &&
    'encrypt' in value &&
    typeof value.encrypt === 'function' &&
    'verify' in value &&
    typeof value.verify === 'function'
  );
}
