/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for an app that hashes passwords.
 * - Builds the registry, policy and context ONCE and shares them.
 *
 * RULES:
 * - No hashing logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';

import { configureLogger, logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { cryptoRandom } from '../shared/security/random';
import type { RandomSource } from '../shared/security/random';

import { initializeRegistry } from '../modules/registry/handler.registry';
import type { HandlerRegistry } from '../modules/registry/handler.registry';
import { Policy } from '../modules/policy/policy';
import { CryptContext } from '../modules/context/crypt-context';
import { ContextPasswordHasher } from '../modules/context/context-password-hasher';

export type AppDeps = {
  logger: Logger;
  random: RandomSource;

  registry: HandlerRegistry;
  policy: Policy;
  context: CryptContext;
  passwordHasher: PasswordHasher;
};

/** Env-derived policy, with the optional policy file layered on top. */
export function buildPolicy(config: AppConfig): Policy {
  const { passhash } = config;

  const base = Policy.fromMapping({
    schemes: passhash.schemes,
    default: passhash.defaultScheme,
    deprecated: passhash.deprecated,
  });

  return passhash.policyPath === undefined
    ? base
    : base.replace(Policy.fromPath(passhash.policyPath, passhash.policySection));
}

export function buildDeps(config: AppConfig, overrides: { random?: RandomSource } = {}): AppDeps {
  configureLogger({ level: config.logLevel, service: config.serviceName, env: config.nodeEnv });
  const random = overrides.random ?? cryptoRandom;

  const registry = initializeRegistry();
  const policy = buildPolicy(config);
  const context = new CryptContext(policy, { registry, random });
  const passwordHasher = new ContextPasswordHasher(context);

  logger.info('app.deps_built', {
    schemes: context.schemes(),
    defaultScheme: context.getHandler().name,
  });

  return {
    logger,
    random,
    registry,
    policy,
    context,
    passwordHasher,
  };
}
