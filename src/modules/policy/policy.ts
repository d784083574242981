/**
 * src/modules/policy/policy.ts
 *
 * WHY:
 * - Hashing settings come from several places (library defaults, a deployment ini file,
 *   per-call tweaks) and need one deterministic merge order.
 * - A Policy is an immutable value: every change produces a new instance.
 *
 * HOW TO USE:
 * - const policy = Policy.fromMapping({ schemes: 'sha512_crypt, bcrypt', 'all__vary_rounds': '10%' })
 * - const tuned = policy.replace({ sha512_crypt__min_rounds: 60000 })
 * - tuned.getOptions('sha512_crypt', 'admin')
 *
 * PRECEDENCE (lowest to highest):
 * - "all" scope -> category scope -> scheme scope.
 * - Across sources: later sources win per (scope, option); schemes / default / deprecated
 *   are replaced wholesale.
 */

import type { z } from 'zod';
import type { PasswordHandler } from '../handlers/handler.types';
import { getDefaultRegistry, type HandlerRegistry } from '../registry/handler.registry';
import { PolicyErrors } from './policy.errors';
import {
  DEFAULT_POLICY_SECTION,
  parseIniSection,
  readPolicyFile,
  stringifyIniSection,
} from './policy.ini';
import { OPTION_SCHEMAS, schemeListSchema, schemeRefSchema } from './policy.schemas';
import {
  ALL_SCOPE,
  AUTO_DEPRECATED,
  POLICY_OPTION_NAMES,
  type PolicyMapping,
  type PolicyOptionName,
  type PolicyOptions,
  type PolicyState,
  type SchemeRef,
  type VaryRounds,
} from './policy.types';

export type PolicySource = Policy | PolicyMapping | string;

type MutableState = {
  schemes?: string[];
  defaultScheme?: string;
  deprecated?: string[];
  options: Map<string, PolicyOptions>;
  handlerRefs: Map<string, PasswordHandler>;
};

type OptionValue = number | VaryRounds;

const OPTION_KEY_PATTERN = /^(.+?)(?:__|\.)([a-z]+(?:_[a-z]+)*)$/;

function isOptionName(name: string): name is PolicyOptionName {
  return POLICY_OPTION_NAMES.some((option) => option === name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function renderVaryRounds(vary: VaryRounds): number | string {
  return vary.kind === 'percent' ? `${vary.value}%` : vary.value;
}

function renderOption(value: OptionValue): number | string {
  return typeof value === 'number' ? value : renderVaryRounds(value);
}

export class Policy {
  readonly schemes?: readonly string[];
  readonly defaultScheme?: string;
  readonly deprecated?: readonly string[];
  private readonly options: ReadonlyMap<string, Readonly<PolicyOptions>>;
  private readonly handlerRefs: ReadonlyMap<string, PasswordHandler>;

  private constructor(state: PolicyState) {
    this.schemes = state.schemes === undefined ? undefined : Object.freeze([...state.schemes]);
    this.defaultScheme = state.defaultScheme;
    this.deprecated = state.deprecated === undefined ? undefined : Object.freeze([...state.deprecated]);
    this.options = state.options;
    this.handlerRefs = state.handlerRefs;

    Policy.validate(state);
    Object.freeze(this);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Construction
  // ───────────────────────────────────────────────────────────────────────────

  static empty(): Policy {
    return new Policy({ options: new Map(), handlerRefs: new Map() });
  }

  static fromMapping(mapping: PolicyMapping): Policy {
    if (!isRecord(mapping)) {
      throw PolicyErrors.unsupportedSource(describe(mapping));
    }

    const state: MutableState = { options: new Map(), handlerRefs: new Map() };
    for (const [key, raw] of Object.entries(mapping)) {
      if (raw === undefined || raw === null) continue;

      if (key === 'schemes') {
        state.schemes = Policy.parseSchemeList(key, raw, state.handlerRefs);
      } else if (key === 'default') {
        state.defaultScheme = Policy.parseSchemeRef(key, raw, state.handlerRefs);
      } else if (key === 'deprecated') {
        state.deprecated = Policy.parseSchemeList(key, raw, state.handlerRefs);
      } else {
        Policy.parseOption(key, raw, state.options);
      }
    }

    return new Policy(state);
  }

  static fromString(text: string, section: string = DEFAULT_POLICY_SECTION): Policy {
    return Policy.fromMapping(parseIniSection(text, section));
  }

  static fromPath(path: string, section: string = DEFAULT_POLICY_SECTION): Policy {
    return Policy.fromString(readPolicyFile(path), section);
  }

  /**
   * Policy -> same instance; multi-line string -> ini text; other string -> file path;
   * plain object -> mapping.
   */
  static fromSource(source: PolicySource, section: string = DEFAULT_POLICY_SECTION): Policy {
    if (source instanceof Policy) return source;
    if (typeof source === 'string') {
      return source.includes('\n')
        ? Policy.fromString(source, section)
        : Policy.fromPath(source, section);
    }
    if (isRecord(source)) return Policy.fromMapping(source);
    throw PolicyErrors.unsupportedSource(describe(source));
  }

  static fromSources(sources: readonly PolicySource[], section?: string): Policy {
    const [first, ...rest] = sources;
    if (first === undefined) {
      throw PolicyErrors.noSources();
    }
    return Policy.fromSource(first, section).replace(...rest);
  }

  /** New policy with each overlay applied in order on top of this one. */
  replace(...overlays: PolicySource[]): Policy {
    return overlays.reduce<Policy>((base, overlay) => base.merge(Policy.fromSource(overlay)), this);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────────

  hasSchemes(): boolean {
    return (this.schemes?.length ?? 0) > 0;
  }

  /** Effective options for one scheme, optionally within a category. */
  getOptions(scheme: string, category?: string): PolicyOptions {
    const merged: PolicyOptions = {};
    const scopes = [ALL_SCOPE];
    if (category !== undefined && category !== ALL_SCOPE) scopes.push(category);
    scopes.push(scheme);

    for (const scope of scopes) {
      const options = this.options.get(scope);
      if (options) Object.assign(merged, options);
    }
    return merged;
  }

  /** Inline handler supplied for `scheme`, if any. */
  getHandlerRef(scheme: string): PasswordHandler | undefined {
    return this.handlerRefs.get(scheme);
  }

  /** The scheme new hashes use: the declared default, else the first listed scheme. */
  resolveDefaultScheme(): string | undefined {
    return this.defaultScheme ?? this.schemes?.[0];
  }

  handlerIsDeprecated(scheme: string | PasswordHandler): boolean {
    const name = typeof scheme === 'string' ? scheme : scheme.name;
    if (!this.deprecated) return false;
    if (this.deprecated.includes(AUTO_DEPRECATED)) {
      return name !== this.resolveDefaultScheme();
    }
    return this.deprecated.includes(name);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Serialization
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Mapping form, accepted back by fromMapping. With `resolve`, scheme names become
   * handler objects (inline handlers first, then the registry).
   */
  toDict(opts: { resolve?: boolean; registry?: HandlerRegistry } = {}): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    const resolve = (name: string): SchemeRef => {
      if (!opts.resolve) return name;
      return this.handlerRefs.get(name) ?? (opts.registry ?? getDefaultRegistry()).require(name);
    };

    if (this.schemes !== undefined) out.schemes = this.schemes.map(resolve);
    if (this.defaultScheme !== undefined) out.default = resolve(this.defaultScheme);
    if (this.deprecated !== undefined) {
      out.deprecated = this.deprecated.map((name) => (name === AUTO_DEPRECATED ? name : resolve(name)));
    }

    for (const [scope, option, value] of this.optionEntries()) {
      out[`${scope}__${option}`] = renderOption(value);
    }
    return out;
  }

  /**
   * Flat key/value pairs. `ini: true` yields dotted keys and string values
   * (scheme lists comma-joined), ready for an ini section.
   */
  iterConfig(opts: { ini?: boolean } = {}): Array<[string, unknown]> {
    const entries: Array<[string, unknown]> = [];
    const list = (names: readonly string[]) => (opts.ini ? names.join(', ') : [...names]);

    if (this.schemes !== undefined) entries.push(['schemes', list(this.schemes)]);
    if (this.defaultScheme !== undefined) entries.push(['default', this.defaultScheme]);
    if (this.deprecated !== undefined) entries.push(['deprecated', list(this.deprecated)]);

    for (const [scope, option, value] of this.optionEntries()) {
      const rendered = renderOption(value);
      entries.push(
        opts.ini ? [`${scope}.${option}`, String(rendered)] : [`${scope}__${option}`, rendered],
      );
    }
    return entries;
  }

  toString(section: string = DEFAULT_POLICY_SECTION): string {
    const entries = this.iterConfig({ ini: true }).map(
      ([key, value]): [string, string] => [key, String(value)],
    );
    return stringifyIniSection(entries, section);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  /** [scope, option, value] in scope then option order. */
  private *optionEntries(): Generator<[string, PolicyOptionName, OptionValue]> {
    for (const [scope, options] of this.options) {
      for (const option of POLICY_OPTION_NAMES) {
        const value = options[option];
        if (value !== undefined) yield [scope, option, value];
      }
    }
  }

  private merge(overlay: Policy): Policy {
    const options = new Map<string, PolicyOptions>();
    for (const [scope, values] of this.options) options.set(scope, { ...values });
    for (const [scope, values] of overlay.options) {
      options.set(scope, { ...options.get(scope), ...values });
    }

    const handlerRefs = new Map(this.handlerRefs);
    for (const [name, handler] of overlay.handlerRefs) handlerRefs.set(name, handler);

    return new Policy({
      schemes: overlay.schemes ?? this.schemes,
      defaultScheme: overlay.defaultScheme ?? this.defaultScheme,
      deprecated: overlay.deprecated ?? this.deprecated,
      options,
      handlerRefs,
    });
  }

  private static validate(state: PolicyState): void {
    for (const [scope, options] of state.options) {
      if (
        options.min_rounds !== undefined &&
        options.max_rounds !== undefined &&
        options.min_rounds > options.max_rounds
      ) {
        throw PolicyErrors.invalidRoundsRange(scope);
      }
    }

    const { schemes, defaultScheme, deprecated } = state;
    if (schemes === undefined) return;

    const seen = new Set<string>();
    for (const scheme of schemes) {
      if (seen.has(scheme)) throw PolicyErrors.duplicateScheme(scheme);
      seen.add(scheme);
    }

    if (defaultScheme !== undefined && !seen.has(defaultScheme)) {
      throw PolicyErrors.defaultNotInSchemes(defaultScheme);
    }

    if (deprecated !== undefined) {
      const auto = deprecated.includes(AUTO_DEPRECATED);
      if (auto && deprecated.length > 1) {
        throw PolicyErrors.invalidValue('deprecated', '"auto" cannot be combined with scheme names');
      }
      if (!auto) {
        const unknown = deprecated.filter((name) => !seen.has(name));
        if (unknown.length > 0) throw PolicyErrors.deprecatedNotInSchemes(unknown);

        const effectiveDefault = defaultScheme ?? schemes[0];
        if (effectiveDefault !== undefined && deprecated.includes(effectiveDefault)) {
          throw PolicyErrors.defaultIsDeprecated(effectiveDefault);
        }
      }
    }
  }

  private static parseSchemeRef(
    key: string,
    raw: unknown,
    handlerRefs: Map<string, PasswordHandler>,
  ): string {
    const parsed = schemeRefSchema.safeParse(raw);
    if (!parsed.success) {
      throw PolicyErrors.invalidValue(key, parsed.error.issues[0]?.message ?? 'invalid', parsed.error);
    }
    return Policy.registerRef(parsed.data, handlerRefs);
  }

  private static parseSchemeList(
    key: string,
    raw: unknown,
    handlerRefs: Map<string, PasswordHandler>,
  ): string[] {
    const parsed = schemeListSchema.safeParse(raw);
    if (!parsed.success) {
      throw PolicyErrors.invalidValue(key, parsed.error.issues[0]?.message ?? 'invalid', parsed.error);
    }
    return parsed.data.map((ref) => Policy.registerRef(ref, handlerRefs));
  }

  private static registerRef(ref: SchemeRef, handlerRefs: Map<string, PasswordHandler>): string {
    if (typeof ref === 'string') return ref;

    const existing = handlerRefs.get(ref.name);
    if (existing !== undefined && existing !== ref) {
      throw PolicyErrors.conflictingHandler(ref.name);
    }
    handlerRefs.set(ref.name, ref);
    return ref.name;
  }

  private static parseOption(key: string, raw: unknown, options: Map<string, PolicyOptions>): void {
    const match = OPTION_KEY_PATTERN.exec(key);
    const scope = match?.[1];
    const option = match?.[2];
    if (scope === undefined || option === undefined) {
      throw PolicyErrors.unrecognizedKey(key);
    }
    if (!isOptionName(option)) {
      throw PolicyErrors.unknownOption(key, option);
    }

    const scoped = options.get(scope) ?? {};
    if (option === 'vary_rounds') {
      scoped.vary_rounds = Policy.parseValue(key, OPTION_SCHEMAS.vary_rounds, raw);
    } else {
      scoped[option] = Policy.parseValue(key, OPTION_SCHEMAS[option], raw);
    }
    options.set(scope, scoped);
  }

  private static parseValue<S extends z.ZodTypeAny>(key: string, schema: S, raw: unknown): z.output<S> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw PolicyErrors.invalidValue(key, parsed.error.issues[0]?.message ?? 'invalid', parsed.error);
    }
    return parsed.data;
  }
}
