/**
 * src/modules/registry/handler.registry.ts
 *
 * WHY:
 * - Policies and contexts refer to schemes by name; something has to own name -> handler.
 * - A process-wide default registry is filled once, at startup, from the builtin list.
 *
 * HOW TO USE:
 * - const registry = getDefaultRegistry()
 * - registry.require('sha512_crypt').encrypt('secret')
 * - Tests (or apps with custom schemes) build their own: new HandlerRegistry([...])
 *
 * RULES:
 * - Registration happens during startup only; lookups never mutate.
 * - Duplicate names are a hard error (MISCONFIGURED_HANDLER).
 */

import { PasshashError } from '../../shared/errors/errors';
import { logger } from '../../shared/logger/logger';
import type { PasswordHandler } from '../handlers/handler.types';
import { BUILTIN_HANDLERS } from './builtin-handlers';

export class HandlerRegistry {
  private readonly handlers = new Map<string, PasswordHandler>();

  constructor(handlers: readonly PasswordHandler[] = []) {
    for (const handler of handlers) this.register(handler);
  }

  register(handler: PasswordHandler): void {
    if (this.handlers.has(handler.name)) {
      throw PasshashError.misconfiguredHandler(`Handler already registered: ${handler.name}`, {
        scheme: handler.name,
      });
    }
    this.handlers.set(handler.name, handler);
  }

  get(name: string): PasswordHandler | undefined {
    return this.handlers.get(name);
  }

  require(name: string): PasswordHandler {
    const handler = this.handlers.get(name);
    if (!handler) {
      throw PasshashError.unknownScheme(`Unknown scheme: ${name}`, { scheme: name });
    }
    return handler;
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  list(): string[] {
    return [...this.handlers.keys()];
  }
}

let defaultRegistry: HandlerRegistry | undefined;

/**
 * Builds the process-wide registry. Calling it again is a no-op that returns the
 * existing instance, so the builtin list is only registered once.
 */
export function initializeRegistry(
  handlers: readonly PasswordHandler[] = BUILTIN_HANDLERS,
): HandlerRegistry {
  if (defaultRegistry) return defaultRegistry;

  defaultRegistry = new HandlerRegistry(handlers);
  logger.info('registry.initialized', { schemes: defaultRegistry.list() });
  return defaultRegistry;
}

export function getDefaultRegistry(): HandlerRegistry {
  return defaultRegistry ?? initializeRegistry();
}
