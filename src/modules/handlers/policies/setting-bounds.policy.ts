/**
 * src/modules/handlers/policies/setting-bounds.policy.ts
 *
 * WHY:
 * - Every handler applies the same rules to rounds and salts, whether the values come
 *   from a caller, a policy, or a parsed hash.
 * - Pure logic (no I/O besides warn logs) => easy to unit test.
 *
 * RULES:
 * - strict: out-of-range values raise SETTING_OUT_OF_RANGE.
 * - relaxed: values are clamped / truncated and a warn event is logged; the operation
 *   continues.
 * - A salt shorter than the minimum always raises (there is nothing to correct it to).
 * - Rounds below the minimum raise when the capability sets `strictBounds`.
 * - useDefaults=false: an unset value raises instead of falling back to a default.
 */

import { withHandlerContext } from '../../../shared/logger/with-context';
import { cryptoRandom, type RandomSource } from '../../../shared/security/random';
import { HandlerErrors } from '../handler.errors';
import type { HandlerSpec, RoundsCapability, Salt, SaltCapability } from '../handler.types';

export type NormalizeOptions = {
  scheme: string;
  strict?: boolean;
  /** Defaults to true. */
  useDefaults?: boolean;
  /** Event name for relaxed corrections. */
  event?: string;
};

const HANDLER_NAME_PATTERN = /^[a-z0-9_]+$/;

export function normalizeRounds(
  requested: number | undefined,
  bounds: RoundsCapability,
  opts: NormalizeOptions,
): number {
  const { scheme } = opts;

  if (requested === undefined) {
    if (opts.useDefaults === false) {
      throw HandlerErrors.settingOutOfRange(scheme, 'rounds must be specified');
    }
    return bounds.defaultRounds;
  }

  if (!Number.isSafeInteger(requested)) {
    throw HandlerErrors.settingOutOfRange(scheme, 'rounds must be an integer', { requested });
  }

  if (requested < bounds.minRounds) {
    if (opts.strict || bounds.strictBounds) {
      throw HandlerErrors.settingOutOfRange(
        scheme,
        `rounds must be >= ${bounds.minRounds}: ${requested}`,
        { requested, min: bounds.minRounds },
      );
    }
    warnCorrected(opts, 'settings.rounds_clamped', 'rounds', requested, bounds.minRounds);
    return bounds.minRounds;
  }

  if (requested > bounds.maxRounds) {
    if (opts.strict) {
      throw HandlerErrors.settingOutOfRange(
        scheme,
        `rounds must be <= ${bounds.maxRounds}: ${requested}`,
        { requested, max: bounds.maxRounds },
      );
    }
    warnCorrected(opts, 'settings.rounds_clamped', 'rounds', requested, bounds.maxRounds);
    return bounds.maxRounds;
  }

  return requested;
}

export function normalizeSaltSize<TSalt extends Salt>(
  requested: number | undefined,
  capability: SaltCapability<TSalt>,
  opts: NormalizeOptions,
): number {
  const { scheme } = opts;

  if (requested === undefined) {
    if (opts.useDefaults === false) {
      throw HandlerErrors.settingOutOfRange(scheme, 'salt size must be specified');
    }
    return capability.defaultSize;
  }

  if (!Number.isSafeInteger(requested)) {
    throw HandlerErrors.settingOutOfRange(scheme, 'salt size must be an integer', { requested });
  }

  const { minSize, maxSize } = capability;
  if (requested >= minSize && requested <= maxSize) return requested;

  if (opts.strict) {
    throw HandlerErrors.settingOutOfRange(
      scheme,
      `salt size must be in [${minSize}, ${maxSize}]: ${requested}`,
      { requested, min: minSize, max: maxSize },
    );
  }

  const applied = requested < minSize ? minSize : maxSize;
  warnCorrected(opts, 'settings.salt_size_clamped', 'saltSize', requested, applied);
  return applied;
}

export function normalizeSalt<TSalt extends Salt>(
  requested: Salt | undefined,
  capability: SaltCapability<TSalt>,
  opts: NormalizeOptions & { saltSize?: number; random?: RandomSource },
): TSalt {
  const { scheme } = opts;

  if (requested === undefined) {
    if (opts.useDefaults === false) {
      throw HandlerErrors.settingOutOfRange(scheme, 'salt must be specified');
    }
    const size = normalizeSaltSize(opts.saltSize, capability, opts);
    return capability.generate(size, opts.random ?? cryptoRandom);
  }

  let salt = capability.accept(requested, scheme);
  const size = capability.sizeOf(salt);

  if (size < capability.minSize) {
    throw HandlerErrors.settingOutOfRange(
      scheme,
      `salt too small (min ${capability.minSize} ${unitOf(capability)})`,
      { size, min: capability.minSize },
    );
  }

  if (size > capability.maxSize) {
    if (opts.strict) {
      throw HandlerErrors.settingOutOfRange(
        scheme,
        `salt too large (max ${capability.maxSize} ${unitOf(capability)})`,
        { size, max: capability.maxSize },
      );
    }
    salt = capability.truncate(salt, capability.maxSize);
    warnCorrected(opts, 'settings.salt_truncated', 'salt', size, capability.maxSize);
  }

  if (capability.canonical) {
    const canonical = capability.canonical(salt);
    if (canonical !== salt) {
      withHandlerContext(scheme).warn('settings.salt_repaired', { setting: 'salt' });
    }
    salt = canonical;
  }

  return salt;
}

/** Construction-time checks. Throws MISCONFIGURED_HANDLER. */
export function validateHandlerSpec<TSalt extends Salt>(spec: HandlerSpec<TSalt>): void {
  const fail = (reason: string) => HandlerErrors.misconfigured(spec.name || '<unnamed>', reason);

  if (!HANDLER_NAME_PATTERN.test(spec.name)) {
    throw fail('name must match [a-z0-9_]+');
  }
  if (spec.idents.length === 0 || spec.idents.some((ident) => ident === '')) {
    throw fail('at least one non-empty ident is required');
  }

  const { rounds, salt } = spec;
  if (
    !Number.isSafeInteger(rounds.minRounds) ||
    !Number.isSafeInteger(rounds.maxRounds) ||
    !Number.isSafeInteger(rounds.defaultRounds)
  ) {
    throw fail('rounds bounds must be integers');
  }
  if (!(rounds.minRounds <= rounds.defaultRounds && rounds.defaultRounds <= rounds.maxRounds)) {
    throw fail('rounds bounds must satisfy min <= default <= max');
  }
  if (rounds.cost !== 'linear' && rounds.cost !== 'log2') {
    throw fail('rounds cost must be linear or log2');
  }

  if (!(salt.minSize >= 0 && salt.minSize <= salt.defaultSize && salt.defaultSize <= salt.maxSize)) {
    throw fail('salt sizes must satisfy 0 <= min <= default <= max');
  }
  if (salt.kind === 'chars') {
    if (!salt.charset || !salt.defaultCharset) {
      throw fail('character salts need a charset');
    }
    const allowed = new Set(salt.charset);
    if ([...salt.defaultCharset].some((c) => !allowed.has(c))) {
      throw fail('default salt charset must be a subset of the salt charset');
    }
    const forbidden = salt.forbiddenChars ?? '';
    if ([...salt.defaultCharset].some((c) => forbidden.includes(c))) {
      throw fail('default salt charset must not contain forbidden characters');
    }
  }

  if (!Number.isSafeInteger(spec.checksumSize) || spec.checksumSize <= 0) {
    throw fail('checksum size must be a positive integer');
  }
}

function unitOf<TSalt extends Salt>(capability: SaltCapability<TSalt>): string {
  return capability.kind === 'bytes' ? 'bytes' : 'chars';
}

function warnCorrected(
  opts: NormalizeOptions,
  defaultEvent: string,
  setting: string,
  requested: number,
  applied: number,
): void {
  withHandlerContext(opts.scheme).warn(opts.event ?? defaultEvent, { setting, requested, applied });
}
