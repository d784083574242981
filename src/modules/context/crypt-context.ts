/**
 * src/modules/context/crypt-context.ts
 *
 * WHY:
 * - Application code should say "hash this" / "check this", not pick schemes or costs.
 * - The context pairs one Policy with the handlers it names and does the dispatch:
 *   which scheme, which settings, and whether a stored hash should be upgraded.
 *
 * HOW TO USE:
 * - const ctx = new CryptContext({ schemes: ['sha512_crypt', 'bcrypt'], deprecated: ['bcrypt'] })
 * - const hash = ctx.encrypt('secret')
 * - const { valid, replacement } = ctx.verifyAndUpdate('secret', storedHash)
 *
 * RULES:
 * - Immutable. replace() returns a new context.
 * - Handlers come from inline policy handlers first, then the registry.
 * - An empty or missing hash never verifies and never reaches a digest.
 */

import { withHandlerContext } from '../../shared/logger/with-context';
import { cryptoRandom, type RandomSource } from '../../shared/security/random';
import type {
  HashContext,
  HashOptions,
  PasswordHandler,
  RoundsCapability,
  Salt,
  Secret,
} from '../handlers/handler.types';
import { normalizeRounds } from '../handlers/policies/setting-bounds.policy';
import { Policy, type PolicySource } from '../policy/policy';
import type { PolicyOptions } from '../policy/policy.types';
import { getDefaultRegistry, type HandlerRegistry } from '../registry/handler.registry';
import { ContextErrors } from './context.errors';
import { applyVaryRounds } from './policies/vary-rounds.policy';

export type ContextDeps = {
  registry?: HandlerRegistry;
  random?: RandomSource;
};

export type EncryptOptions = {
  scheme?: string;
  category?: string;
  salt?: Salt;
  saltSize?: number;
  rounds?: number;
  strict?: boolean;
  context?: HashContext;
};

export type VerifyOptions = {
  scheme?: string;
  category?: string;
  context?: HashContext;
};

export type IdentifyOptions = {
  required?: boolean;
};

export type VerifyAndUpdateResult = {
  valid: boolean;
  /** Fresh hash to store, present only when the old one verified but is outdated. */
  replacement?: string;
};

export class CryptContext {
  readonly policy: Policy;
  private readonly handlers: ReadonlyMap<string, PasswordHandler>;
  private readonly defaultHandler: PasswordHandler;
  private readonly deps: ContextDeps;
  private readonly random: RandomSource;

  constructor(source: PolicySource, deps: ContextDeps = {}) {
    this.policy = Policy.fromSource(source);
    this.deps = deps;
    this.random = deps.random ?? cryptoRandom;

    const schemes = this.policy.schemes ?? [];
    if (schemes.length === 0) {
      throw ContextErrors.noSchemes();
    }

    const registry = deps.registry ?? getDefaultRegistry();
    const handlers = new Map<string, PasswordHandler>();
    for (const name of schemes) {
      const handler = this.policy.getHandlerRef(name) ?? registry.get(name);
      if (!handler) throw ContextErrors.unknownScheme(name);
      handlers.set(name, handler);
    }
    this.handlers = handlers;

    const defaultName = this.policy.resolveDefaultScheme();
    const defaultHandler = defaultName === undefined ? undefined : handlers.get(defaultName);
    if (!defaultHandler) throw ContextErrors.noSchemes();
    this.defaultHandler = defaultHandler;

    Object.freeze(this);
  }

  static fromString(text: string, section?: string, deps?: ContextDeps): CryptContext {
    return new CryptContext(Policy.fromString(text, section), deps);
  }

  static fromPath(path: string, section?: string, deps?: ContextDeps): CryptContext {
    return new CryptContext(Policy.fromPath(path, section), deps);
  }

  /** New context whose policy has the overlays applied. Same registry and random source. */
  replace(...overlays: PolicySource[]): CryptContext {
    return new CryptContext(this.policy.replace(...overlays), this.deps);
  }

  schemes(): string[] {
    return [...this.handlers.keys()];
  }

  /** Handler for `scheme`, or the default handler when omitted. */
  getHandler(scheme?: string): PasswordHandler {
    if (scheme === undefined) return this.defaultHandler;
    const handler = this.handlers.get(scheme);
    if (!handler) throw ContextErrors.schemeNotInContext(scheme);
    return handler;
  }

  handlerIsDeprecated(scheme: string | PasswordHandler): boolean {
    return this.policy.handlerIsDeprecated(scheme);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Identify
  // ───────────────────────────────────────────────────────────────────────────

  /** Name of the first configured scheme that recognizes `hash`. */
  identify(hash: string | null | undefined, opts: { required: true }): string;
  identify(hash: string | null | undefined, opts?: IdentifyOptions): string | undefined;
  identify(hash: string | null | undefined, opts: IdentifyOptions = {}): string | undefined {
    return this.identifyHandler(hash, opts)?.name;
  }

  identifyHandler(hash: string | null | undefined, opts: { required: true }): PasswordHandler;
  identifyHandler(hash: string | null | undefined, opts?: IdentifyOptions): PasswordHandler | undefined;
  identifyHandler(
    hash: string | null | undefined,
    opts: IdentifyOptions = {},
  ): PasswordHandler | undefined {
    if (hash) {
      for (const handler of this.handlers.values()) {
        if (handler.identify(hash)) return handler;
      }
    }
    if (opts.required) throw ContextErrors.unidentifiedHash();
    return undefined;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Hashing
  // ───────────────────────────────────────────────────────────────────────────

  genconfig(opts: EncryptOptions = {}): string {
    const handler = this.getHandler(opts.scheme);
    return handler.genconfig(this.settingsFor(handler, opts));
  }

  genhash(secret: Secret, config: string, opts: VerifyOptions = {}): string {
    const handler =
      opts.scheme === undefined
        ? this.identifyHandler(config, { required: true })
        : this.getHandler(opts.scheme);
    return handler.genhash(secret, config, opts.context);
  }

  encrypt(secret: Secret, opts: EncryptOptions = {}): string {
    const handler = this.getHandler(opts.scheme);
    return handler.encrypt(secret, this.settingsFor(handler, opts), opts.context);
  }

  verify(secret: Secret, hash: string | null | undefined, opts: VerifyOptions = {}): boolean {
    if (!hash) return false;

    let handler: PasswordHandler;
    if (opts.scheme !== undefined) {
      handler = this.getHandler(opts.scheme);
      if (!handler.identify(hash)) throw ContextErrors.hashNotRecognized(opts.scheme);
    } else {
      handler = this.identifyHandler(hash, { required: true });
    }
    return handler.verify(secret, hash, opts.context);
  }

  /** True when `hash` uses a deprecated scheme or rounds outside the policy's window. */
  needsUpdate(hash: string, opts: { category?: string; scheme?: string } = {}): boolean {
    const handler =
      opts.scheme === undefined
        ? this.identifyHandler(hash, { required: true })
        : this.getHandler(opts.scheme);
    const log = withHandlerContext(handler.name);

    if (this.policy.handlerIsDeprecated(handler)) {
      log.debug('context.hash_needs_update', { reason: 'deprecated' });
      return true;
    }

    const { rounds } = handler.fromString(hash);
    const options = this.policy.getOptions(handler.name, opts.category);
    if (options.min_rounds !== undefined && rounds < options.min_rounds) {
      log.debug('context.hash_needs_update', { reason: 'rounds_below_min', rounds });
      return true;
    }
    if (options.max_rounds !== undefined && rounds > options.max_rounds) {
      log.debug('context.hash_needs_update', { reason: 'rounds_above_max', rounds });
      return true;
    }
    return false;
  }

  verifyAndUpdate(
    secret: Secret,
    hash: string | null | undefined,
    opts: VerifyOptions = {},
  ): VerifyAndUpdateResult {
    if (!hash || !this.verify(secret, hash, opts)) {
      return { valid: false };
    }
    if (!this.needsUpdate(hash, { category: opts.category, scheme: opts.scheme })) {
      return { valid: true };
    }
    return {
      valid: true,
      replacement: this.encrypt(secret, { category: opts.category, context: opts.context }),
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Settings
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Policy options for the handler, overridden by call-time values. Policy values the
   * handler does not accept are dropped; call-time values are passed through so the
   * handler can reject them.
   */
  private settingsFor(handler: PasswordHandler, opts: EncryptOptions): HashOptions {
    const options = this.policy.getOptions(handler.name, opts.category);
    const accepts = (keyword: 'salt' | 'saltSize' | 'rounds') =>
      handler.settingKeywords.includes(keyword);

    const settings: HashOptions = { strict: opts.strict, random: this.random };
    if (opts.salt !== undefined) settings.salt = opts.salt;

    if (opts.saltSize !== undefined) {
      settings.saltSize = opts.saltSize;
    } else if (opts.salt === undefined && options.salt_size !== undefined && accepts('saltSize')) {
      settings.saltSize = options.salt_size;
    }

    if (opts.rounds !== undefined || accepts('rounds')) {
      settings.rounds = this.resolveRounds(handler, options, opts);
    }
    return settings;
  }

  private resolveRounds(handler: PasswordHandler, options: PolicyOptions, opts: EncryptOptions): number {
    const bounds: RoundsCapability = {
      ...handler.rounds,
      minRounds: options.min_rounds ?? handler.rounds.minRounds,
      maxRounds: options.max_rounds ?? handler.rounds.maxRounds,
    };
    const normalize = { scheme: handler.name, event: 'policy.rounds_clamped' };

    if (opts.rounds !== undefined) {
      return normalizeRounds(opts.rounds, bounds, { ...normalize, strict: opts.strict });
    }

    let rounds = options.rounds ?? options.default_rounds ?? handler.rounds.defaultRounds;
    if (options.vary_rounds !== undefined) {
      rounds = applyVaryRounds(rounds, options.vary_rounds, {
        cost: handler.rounds.cost,
        minRounds: bounds.minRounds,
        maxRounds: bounds.maxRounds,
        random: this.random,
      });
    }
    return normalizeRounds(rounds, bounds, normalize);
  }
}
