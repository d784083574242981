/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, a local .env is loaded via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - buildConfig(env) takes an explicit env object so tests don't touch process.env.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const SchemeListSchema = z
  .string()
  .transform((text) =>
    text
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0),
  )
  .pipe(z.array(z.string().regex(/^[a-z0-9_]+$/, 'Scheme names must match [a-z0-9_]+')));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('passhash'),

  // Hashing policy
  PASSHASH_SCHEMES: SchemeListSchema.default('pbkdf2_sha256,sha512_crypt,bcrypt'),
  PASSHASH_DEFAULT_SCHEME: z.string().min(1).optional(),
  PASSHASH_DEPRECATED: SchemeListSchema.optional(),
  PASSHASH_POLICY_PATH: z.string().min(1).optional(),
  PASSHASH_POLICY_SECTION: z.string().min(1).default('passhash'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;

  logLevel: string;
  serviceName: string;

  passhash: {
    schemes: string[];
    defaultScheme?: string;
    deprecated?: string[];
    policyPath?: string;
    policySection: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    passhash: {
      schemes: parsed.PASSHASH_SCHEMES,
      defaultScheme: parsed.PASSHASH_DEFAULT_SCHEME,
      deprecated: parsed.PASSHASH_DEPRECATED,
      policyPath: parsed.PASSHASH_POLICY_PATH,
      policySection: parsed.PASSHASH_POLICY_SECTION,
    },
  };
}
