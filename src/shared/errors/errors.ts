/**
 * src/shared/errors/errors.ts
 *
 * WHY:
 * - Central error primitive used across codecs, handlers, policy and context.
 * - Callers branch on `code`, not on message text.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. handlers/handler.errors.ts).
 * - Never put secrets or full hashes in meta.
 */

export const PASSHASH_ERROR_CODES = [
  'INVALID_HASH',
  'SETTING_OUT_OF_RANGE',
  'UNKNOWN_SCHEME',
  'MISCONFIGURED_HANDLER',
  'INVALID_POLICY',
] as const;

export type PasshashErrorCode = (typeof PASSHASH_ERROR_CODES)[number];
export type PasshashErrorMeta = Record<string, unknown>;

export class PasshashError extends Error {
  readonly code: PasshashErrorCode;
  readonly meta?: PasshashErrorMeta;

  constructor(opts: {
    code: PasshashErrorCode;
    message: string;
    meta?: PasshashErrorMeta;
    cause?: unknown;
  }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'PasshashError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static invalidHash(message = 'Invalid hash', meta?: PasshashErrorMeta, cause?: unknown) {
    return new PasshashError({ code: 'INVALID_HASH', message, meta, cause });
  }

  static settingOutOfRange(message = 'Setting out of range', meta?: PasshashErrorMeta) {
    return new PasshashError({ code: 'SETTING_OUT_OF_RANGE', message, meta });
  }

  static unknownScheme(message = 'Unknown scheme', meta?: PasshashErrorMeta) {
    return new PasshashError({ code: 'UNKNOWN_SCHEME', message, meta });
  }

  static misconfiguredHandler(message = 'Misconfigured handler', meta?: PasshashErrorMeta) {
    return new PasshashError({ code: 'MISCONFIGURED_HANDLER', message, meta });
  }

  static invalidPolicy(message = 'Invalid policy', meta?: PasshashErrorMeta, cause?: unknown) {
    return new PasshashError({ code: 'INVALID_POLICY', message, meta, cause });
  }
}

export function isPasshashError(err: unknown, code?: PasshashErrorCode): err is PasshashError {
  if (!(err instanceof PasshashError)) return false;
  return code === undefined || err.code === code;
}
