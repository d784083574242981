/**
 * src/modules/policy/policy.ini.ts
 *
 * WHY:
 * - Deployments keep hashing policy in an ini file next to the rest of their config.
 * - Only this file knows about ini syntax; Policy works with plain mappings.
 *
 * FORMAT:
 *   [passhash]
 *   schemes = sha512_crypt, pbkdf2_sha256
 *   default = sha512_crypt
 *   sha512_crypt.min_rounds = 50000
 *   all.vary_rounds = 10%
 */

import { readFileSync } from 'node:fs';
import ini from 'ini';
import { PolicyErrors } from './policy.errors';

export const DEFAULT_POLICY_SECTION = 'passhash';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the key/value pairs of one section. */
export function parseIniSection(text: string, section: string): Record<string, unknown> {
  const parsed: unknown = ini.parse(text);
  if (!isRecord(parsed)) {
    throw PolicyErrors.missingSection(section);
  }
  const body = parsed[section];
  if (!isRecord(body)) {
    throw PolicyErrors.missingSection(section);
  }
  return body;
}

export function stringifyIniSection(
  entries: ReadonlyArray<readonly [string, string]>,
  section: string,
): string {
  return ini.stringify({ [section]: Object.fromEntries(entries) }, { whitespace: true });
}

export function readPolicyFile(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (err) {
    throw PolicyErrors.unreadable(path, err);
  }
}
