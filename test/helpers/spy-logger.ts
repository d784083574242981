import { vi } from 'vitest';
import { logger } from '../../src/shared/logger/logger';

/** Silences and records logger.warn; restored after each test by the vitest config. */
export function spyOnWarnings() {
  return vi.spyOn(logger, 'warn').mockImplementation(() => logger);
}

export function spyOnDebug() {
  return vi.spyOn(logger, 'debug').mockImplementation(() => logger);
}
