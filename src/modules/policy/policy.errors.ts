/**
 * src/modules/policy/policy.errors.ts
 *
 * RULES:
 * - Every policy problem surfaces as INVALID_POLICY.
 * - Meta names keys and schemes, never option values that could be secrets.
 */

import { PasshashError } from '../../shared/errors/errors';

export const PolicyErrors = {
  unrecognizedKey(key: string) {
    return PasshashError.invalidPolicy(`Unrecognized policy key: ${key}`, { key });
  },

  unknownOption(key: string, option: string) {
    return PasshashError.invalidPolicy(`Unknown policy option "${option}" in key ${key}`, {
      key,
      option,
    });
  },

  invalidValue(key: string, reason: string, cause?: unknown) {
    return PasshashError.invalidPolicy(`Invalid value for policy key ${key}: ${reason}`, { key }, cause);
  },

  defaultNotInSchemes(scheme: string) {
    return PasshashError.invalidPolicy(`Default scheme ${scheme} is not listed in schemes`, {
      scheme,
    });
  },

  deprecatedNotInSchemes(schemes: readonly string[]) {
    return PasshashError.invalidPolicy(
      `Deprecated schemes not listed in schemes: ${schemes.join(', ')}`,
      { schemes },
    );
  },

  defaultIsDeprecated(scheme: string) {
    return PasshashError.invalidPolicy(`Default scheme ${scheme} cannot be deprecated`, { scheme });
  },

  duplicateScheme(scheme: string) {
    return PasshashError.invalidPolicy(`Scheme listed twice: ${scheme}`, { scheme });
  },

  conflictingHandler(scheme: string) {
    return PasshashError.invalidPolicy(`Two different handlers were supplied for ${scheme}`, {
      scheme,
    });
  },

  invalidRoundsRange(scope: string) {
    return PasshashError.invalidPolicy(`min_rounds exceeds max_rounds for scope ${scope}`, { scope });
  },

  missingSection(section: string) {
    return PasshashError.invalidPolicy(`Policy text has no [${section}] section`, { section });
  },

  unreadable(path: string, cause: unknown) {
    return PasshashError.invalidPolicy(`Policy file could not be read: ${path}`, { path }, cause);
  },

  unsupportedSource(kind: string) {
    return PasshashError.invalidPolicy(`Unsupported policy source: ${kind}`, { kind });
  },

  noSources() {
    return PasshashError.invalidPolicy('At least one policy source is required');
  },
} as const;
