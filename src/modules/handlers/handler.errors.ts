/**
 * src/modules/handlers/handler.errors.ts
 *
 * WHY:
 * - Handlers own the meaning of "bad hash" vs "bad setting" vs "bad handler".
 * - Keeps shared/errors/errors.ts small and stable.
 *
 * RULES:
 * - Use PasshashError as the transport primitive.
 * - Meta carries scheme names and numbers only. Never secrets, salts or hashes.
 */

import { PasshashError, type PasshashErrorMeta } from '../../shared/errors/errors';

export const HandlerErrors = {
  /** Text is not a well-formed hash or config for this scheme. */
  invalidHash(scheme: string, reason: string, cause?: unknown) {
    return PasshashError.invalidHash(`Invalid ${scheme} hash: ${reason}`, { scheme }, cause);
  },

  /** verify() was handed a config string (no checksum). */
  missingChecksum(scheme: string) {
    return PasshashError.invalidHash(`Invalid ${scheme} hash: no checksum present`, { scheme });
  },

  settingOutOfRange(scheme: string, message: string, meta?: PasshashErrorMeta) {
    return PasshashError.settingOutOfRange(`${scheme}: ${message}`, { scheme, ...meta });
  },

  unsupportedSetting(scheme: string, setting: string) {
    return PasshashError.settingOutOfRange(`${scheme} does not accept the "${setting}" setting`, {
      scheme,
      setting,
    });
  },

  missingContext(scheme: string, keyword: string) {
    return PasshashError.settingOutOfRange(`${scheme} requires the "${keyword}" context value`, {
      scheme,
      keyword,
    });
  },

  misconfigured(scheme: string, reason: string) {
    return PasshashError.misconfiguredHandler(`Handler ${scheme} is misconfigured: ${reason}`, {
      scheme,
    });
  },
} as const;
