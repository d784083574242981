/**
 * src/modules/handlers/prefix-wrapper.ts
 *
 * WHY:
 * - Some stores (LDAP) keep an existing scheme's hashes under a different leading tag,
 *   e.g. "{PBKDF2}6400$..." for "$pbkdf2$6400$...".
 * - Wrapping reuses the inner handler instead of declaring a second format.
 *
 * RULES:
 * - The inner handler never sees the wrapper prefix; callers never see the inner one.
 */

import { HandlerErrors } from './handler.errors';
import type {
  HashContext,
  HashOptions,
  HashRecord,
  PasswordHandler,
  RoundsCapability,
  Secret,
  SettingKeyword,
} from './handler.types';

export type PrefixWrapperOptions = {
  name: string;
  description?: string;
  wrapped: PasswordHandler;
  /** Prefix used in stored hashes. */
  prefix: string;
  /** Prefix the wrapped handler emits, replaced by `prefix`. */
  originalPrefix: string;
};

export class PrefixWrapper implements PasswordHandler {
  readonly name: string;
  readonly description: string;
  readonly idents: readonly string[];
  readonly wrapped: PasswordHandler;
  private readonly prefix: string;
  private readonly originalPrefix: string;

  constructor(opts: PrefixWrapperOptions) {
    if (!/^[a-z0-9_]+$/.test(opts.name)) {
      throw HandlerErrors.misconfigured(opts.name, 'name must match [a-z0-9_]+');
    }
    if (!opts.prefix) {
      throw HandlerErrors.misconfigured(opts.name, 'prefix must not be empty');
    }
    this.name = opts.name;
    this.description = opts.description ?? `${opts.wrapped.description} (${opts.prefix} prefix)`;
    this.wrapped = opts.wrapped;
    this.prefix = opts.prefix;
    this.originalPrefix = opts.originalPrefix;
    this.idents = Object.freeze([opts.prefix]);
  }

  get settingKeywords(): readonly SettingKeyword[] {
    return this.wrapped.settingKeywords;
  }

  get contextKeywords(): readonly string[] {
    return this.wrapped.contextKeywords;
  }

  get rounds(): RoundsCapability {
    return this.wrapped.rounds;
  }

  get checksumSize(): number {
    return this.wrapped.checksumSize;
  }

  identify(hash: string | null | undefined): boolean {
    if (!hash || !hash.startsWith(this.prefix)) return false;
    return this.wrapped.identify(this.unwrap(hash));
  }

  fromString(hash: string): HashRecord {
    return this.wrapped.fromString(this.unwrap(hash));
  }

  render(record: HashRecord): string {
    return this.wrap(this.wrapped.render(record));
  }

  computeChecksum(secret: Secret, record: HashRecord, context?: HashContext): Buffer {
    return this.wrapped.computeChecksum(secret, record, context);
  }

  genconfig(options?: HashOptions): string {
    return this.wrap(this.wrapped.genconfig(options));
  }

  genhash(secret: Secret, config: string, context?: HashContext): string {
    return this.wrap(this.wrapped.genhash(secret, this.unwrap(config), context));
  }

  encrypt(secret: Secret, options?: HashOptions, context?: HashContext): string {
    return this.wrap(this.wrapped.encrypt(secret, options, context));
  }

  verify(secret: Secret, hash: string, context?: HashContext): boolean {
    return this.wrapped.verify(secret, this.unwrap(hash), context);
  }

  private unwrap(hash: string): string {
    if (!hash.startsWith(this.prefix)) {
      throw HandlerErrors.invalidHash(this.name, `missing ${this.prefix} prefix`);
    }
    return this.originalPrefix + hash.slice(this.prefix.length);
  }

  private wrap(hash: string): string {
    if (!hash.startsWith(this.originalPrefix)) {
      throw HandlerErrors.misconfigured(
        this.name,
        `wrapped handler output does not start with ${this.originalPrefix}`,
      );
    }
    return this.prefix + hash.slice(this.originalPrefix.length);
  }
}
