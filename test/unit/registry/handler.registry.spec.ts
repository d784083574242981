import { describe, it, expect } from 'vitest';
import { BUILTIN_HANDLERS } from '../../../src/modules/registry/builtin-handlers';
import {
  getDefaultRegistry,
  HandlerRegistry,
  initializeRegistry,
} from '../../../src/modules/registry/handler.registry';
import { expectPasshashError } from '../../helpers/expect-passhash-error';
import { createToyHandler } from '../../helpers/toy-handler';

describe('HandlerRegistry', () => {
  it('looks handlers up by name', () => {
    const toy = createToyHandler();
    const registry = new HandlerRegistry([toy]);

    expect(registry.get('toy_digest')).toBe(toy);
    expect(registry.require('toy_digest')).toBe(toy);
    expect(registry.has('toy_digest')).toBe(true);
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.list()).toEqual(['toy_digest']);
  });

  it('raises UNKNOWN_SCHEME for a missing required handler', () => {
    const err = expectPasshashError(() => new HandlerRegistry().require('missing'), 'UNKNOWN_SCHEME');
    expect(err.meta).toEqual({ scheme: 'missing' });
  });

  it('refuses a second handler under the same name', () => {
    const registry = new HandlerRegistry([createToyHandler()]);
    expectPasshashError(() => registry.register(createToyHandler()), 'MISCONFIGURED_HANDLER');
  });

  it('registers every builtin scheme under a unique name', () => {
    const registry = new HandlerRegistry(BUILTIN_HANDLERS);
    expect(registry.list()).toEqual([
      'pbkdf2_sha1',
      'pbkdf2_sha256',
      'pbkdf2_sha512',
      'ldap_pbkdf2_sha1',
      'ldap_pbkdf2_sha256',
      'ldap_pbkdf2_sha512',
      'cta_pbkdf2_sha1',
      'dlitz_pbkdf2_sha1',
      'atlassian_pbkdf2_sha1',
      'grub_pbkdf2_sha512',
      'sha256_crypt',
      'sha512_crypt',
      'bcrypt',
    ]);
  });
});

describe('default registry', () => {
  it('is built once and shared', () => {
    const first = initializeRegistry();
    expect(initializeRegistry()).toBe(first);
    expect(getDefaultRegistry()).toBe(first);
    expect(first.has('sha512_crypt')).toBe(true);
  });
});
