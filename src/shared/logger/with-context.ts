/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - Every normalization / policy log should carry the scheme it concerns.
 * - We don't want every call site repeating the same fields manually.
 *
 * HOW TO USE:
 * - `withHandlerContext('sha512_crypt').warn('settings.rounds_clamped', { requested, applied })`
 */

import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export type ScopedLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withHandlerContext(scheme: string, extra: LogMeta = {}): ScopedLogger {
  const base = { scheme, ...extra };

  return {
    info: (msg, meta = {}) => void logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => void logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => void logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => void logger.debug(msg, { ...base, ...meta }),
  };
}
