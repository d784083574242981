/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for the library.
 * - Relaxed-mode setting corrections are surfaced here instead of being silent.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer `withHandlerContext(scheme)` when logging on behalf of a hash scheme.
 * - Apps call `configureLogger` once with validated config (buildDeps does this).
 * - Never log secrets, salts or full hash strings.
 */

import winston from 'winston';

export type LoggerSettings = {
  level: string;
  service: string;
  env: string;
};

// Until configureLogger runs, raw env vars (or library defaults) apply.
const bootSettings: LoggerSettings = {
  level: process.env.LOG_LEVEL ?? 'info',
  service: process.env.SERVICE_NAME ?? 'passhash',
  env: process.env.NODE_ENV ?? 'development',
};

export const logger = winston.createLogger({
  level: bootSettings.level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: bootSettings.service, env: bootSettings.env },
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
});

export type Logger = typeof logger;

export function configureLogger(settings: LoggerSettings): void {
  logger.level = settings.level;
  logger.defaultMeta = { service: settings.service, env: settings.env };
}
