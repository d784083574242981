import { describe, it, expect } from 'vitest';
import { CryptContext } from '../../../src/modules/context/crypt-context';
import { bcryptHandler } from '../../../src/modules/handlers/schemes/bcrypt';
import { pbkdf2Sha256 } from '../../../src/modules/handlers/schemes/pbkdf2';
import { sha256Crypt } from '../../../src/modules/handlers/schemes/sha-crypt';
import { BUILTIN_HANDLERS } from '../../../src/modules/registry/builtin-handlers';
import { HandlerRegistry } from '../../../src/modules/registry/handler.registry';
import { expectPasshashError } from '../../helpers/expect-passhash-error';
import { fixedRandom } from '../../helpers/fixed-random';
import { spyOnDebug, spyOnWarnings } from '../../helpers/spy-logger';
import { createToyHandler } from '../../helpers/toy-handler';

const registry = new HandlerRegistry(BUILTIN_HANDLERS);
const deps = { registry, random: fixedRandom() };

const POLICY = {
  schemes: 'sha256_crypt, pbkdf2_sha256, bcrypt',
  default: 'sha256_crypt',
  deprecated: 'bcrypt',
  sha256_crypt__default_rounds: 1000,
  pbkdf2_sha256__default_rounds: 1000,
  bcrypt__default_rounds: 4,
};

const GENERATED_SALT = '.'.repeat(16);

describe('CryptContext', () => {
  const ctx = new CryptContext(POLICY, deps);
  const shaHash = sha256Crypt.encrypt('password', { salt: GENERATED_SALT, rounds: 1000 });
  const bcryptHash = bcryptHandler.encrypt('password', { salt: '.'.repeat(22), rounds: 4 });

  describe('construction', () => {
    it('lists schemes in declared order and resolves the default', () => {
      expect(ctx.schemes()).toEqual(['sha256_crypt', 'pbkdf2_sha256', 'bcrypt']);
      expect(ctx.getHandler()).toBe(sha256Crypt);
      expect(ctx.getHandler('bcrypt')).toBe(bcryptHandler);
      expect(Object.isFrozen(ctx)).toBe(true);
    });

    it('falls back to the first scheme when no default is given', () => {
      const plain = new CryptContext({ schemes: 'pbkdf2_sha256, bcrypt' }, deps);
      expect(plain.getHandler().name).toBe('pbkdf2_sha256');
    });

    it('requires at least one scheme', () => {
      expectPasshashError(() => new CryptContext({}, deps), 'INVALID_POLICY');
    });

    it('raises UNKNOWN_SCHEME for names neither inline nor registered', () => {
      expectPasshashError(() => new CryptContext({ schemes: 'no_such_scheme' }, deps), 'UNKNOWN_SCHEME');
      expectPasshashError(() => ctx.getHandler('sha512_crypt'), 'UNKNOWN_SCHEME');
    });

    it('uses inline handlers before the registry', () => {
      const toy = createToyHandler();
      const inline = new CryptContext({ schemes: [toy] }, deps);
      expect(inline.getHandler()).toBe(toy);
      expect(inline.verify('password', inline.encrypt('password'))).toBe(true);
    });

    it('builds from ini text', () => {
      const fromIni = CryptContext.fromString(
        '[passhash]\nschemes = bcrypt, sha256_crypt\nbcrypt.default_rounds = 4\n',
        undefined,
        deps,
      );
      expect(fromIni.schemes()).toEqual(['bcrypt', 'sha256_crypt']);
      expect(fromIni.encrypt('password')).toBe(bcryptHash);
    });

    it('replace() returns a new context over the merged policy', () => {
      const tuned = ctx.replace({ sha256_crypt__default_rounds: 2000 });
      expect(tuned).not.toBe(ctx);
      expect(tuned.encrypt('password')).toBe(
        sha256Crypt.encrypt('password', { salt: GENERATED_SALT, rounds: 2000 }),
      );
      expect(ctx.encrypt('password')).toBe(shaHash);
    });
  });

  describe('encrypt / genconfig / genhash', () => {
    it('hashes with the default scheme and policy rounds', () => {
      expect(ctx.encrypt('password')).toBe(shaHash);
    });

    it('hashes with an explicitly chosen scheme', () => {
      expect(ctx.encrypt('password', { scheme: 'pbkdf2_sha256' })).toBe(
        pbkdf2Sha256.encrypt('password', { salt: Buffer.alloc(16, 0xab), rounds: 1000 }),
      );
      expect(ctx.encrypt('password', { scheme: 'bcrypt' })).toBe(bcryptHash);
    });

    it('lets call-time rounds override the policy', () => {
      expect(ctx.encrypt('password', { rounds: 2000 })).toBe(
        sha256Crypt.encrypt('password', { salt: GENERATED_SALT, rounds: 2000 }),
      );
    });

    it('prefers the rounds option over default_rounds', () => {
      const fixed = ctx.replace({ sha256_crypt__rounds: 1200 });
      expect(fixed.genconfig()).toBe(`$5$rounds=1200$${GENERATED_SALT}`);
    });

    it('clamps policy rounds to the policy minimum and warns', () => {
      const warn = spyOnWarnings();
      const tight = ctx.replace({ sha256_crypt__min_rounds: 1500 });
      expect(tight.genconfig()).toBe(`$5$rounds=1500$${GENERATED_SALT}`);
      expect(warn).toHaveBeenCalledWith('policy.rounds_clamped', {
        scheme: 'sha256_crypt',
        setting: 'rounds',
        requested: 1000,
        applied: 1500,
      });
    });

    it('raises on out-of-policy call-time rounds in strict mode', () => {
      const tight = ctx.replace({ sha256_crypt__min_rounds: 1500 });
      expectPasshashError(() => tight.genconfig({ rounds: 1000, strict: true }), 'SETTING_OUT_OF_RANGE');
    });

    it('applies vary_rounds only when rounds were not given', () => {
      const varied = new CryptContext(
        { ...POLICY, sha256_crypt__vary_rounds: '10%' },
        { registry, random: fixedRandom({ pick: 'max' }) },
      );
      expect(varied.genconfig()).toBe(`$5$rounds=1100$${'.'.repeat(16)}`);
      expect(varied.genconfig({ rounds: 2000 })).toBe(`$5$rounds=2000$${'.'.repeat(16)}`);
    });

    it('varies log2 costs by whole exponents', () => {
      const varied = new CryptContext(
        { ...POLICY, bcrypt__vary_rounds: 2 },
        { registry, random: fixedRandom({ pick: 'max' }) },
      );
      expect(varied.genconfig({ scheme: 'bcrypt' })).toBe(`$2b$06$${'.'.repeat(22)}`);
    });

    it('passes salt_size only to schemes that accept it', () => {
      const sized = ctx.replace({ all__salt_size: 8 });
      expect(sized.genconfig({ scheme: 'pbkdf2_sha256' })).toBe(
        pbkdf2Sha256.genconfig({ salt: Buffer.alloc(8, 0xab), rounds: 1000 }),
      );
      expect(sized.genconfig({ scheme: 'bcrypt' })).toBe(`$2b$04$${'.'.repeat(22)}`);
    });

    it('omits the rounds field of an implicit-default $6$ config', () => {
      const sha512 = new CryptContext({ schemes: 'sha512_crypt', sha512_crypt__default_rounds: 5000 }, deps);
      expect(sha512.genconfig()).toBe(`$6$${GENERATED_SALT}`);
    });

    it('genhash identifies the config when no scheme is named', () => {
      const config = ctx.genconfig();
      expect(ctx.genhash('password', config)).toBe(shaHash);
      expectPasshashError(() => ctx.genhash('password', '$6$saltstring'), 'UNKNOWN_SCHEME');
    });
  });

  describe('identify', () => {
    it('names the first configured scheme that recognizes the hash', () => {
      expect(ctx.identify(shaHash)).toBe('sha256_crypt');
      expect(ctx.identify(bcryptHash)).toBe('bcrypt');
      expect(ctx.identifyHandler(shaHash)).toBe(sha256Crypt);
    });

    it('returns undefined for unknown or empty input', () => {
      expect(ctx.identify('$6$saltstring')).toBeUndefined();
      expect(ctx.identify('')).toBeUndefined();
      expect(ctx.identify(null)).toBeUndefined();
      expect(ctx.identify(undefined)).toBeUndefined();
    });

    it('raises UNKNOWN_SCHEME when identification is required', () => {
      expectPasshashError(() => ctx.identify('$6$saltstring', { required: true }), 'UNKNOWN_SCHEME');
      expectPasshashError(() => ctx.identify(null, { required: true }), 'UNKNOWN_SCHEME');
    });
  });

  describe('verify', () => {
    it('checks the secret against the identified scheme', () => {
      expect(ctx.verify('password', shaHash)).toBe(true);
      expect(ctx.verify('wrong', shaHash)).toBe(false);
      expect(ctx.verify('password', bcryptHash)).toBe(true);
    });

    it('never verifies an empty or absent hash', () => {
      expect(ctx.verify('password', '')).toBe(false);
      expect(ctx.verify('password', null)).toBe(false);
      expect(ctx.verify('password', undefined)).toBe(false);
    });

    it('raises UNKNOWN_SCHEME for a hash no scheme recognizes', () => {
      expectPasshashError(() => ctx.verify('password', '$6$saltstring$abc'), 'UNKNOWN_SCHEME');
    });

    it('raises INVALID_HASH when the named scheme does not recognize the hash', () => {
      expectPasshashError(() => ctx.verify('password', shaHash, { scheme: 'bcrypt' }), 'INVALID_HASH');
      expect(ctx.verify('password', shaHash, { scheme: 'sha256_crypt' })).toBe(true);
    });
  });

  describe('needsUpdate / verifyAndUpdate', () => {
    it('flags hashes of deprecated schemes', () => {
      const debug = spyOnDebug();
      expect(ctx.handlerIsDeprecated('bcrypt')).toBe(true);
      expect(ctx.needsUpdate(bcryptHash)).toBe(true);
      expect(debug).toHaveBeenCalledWith('context.hash_needs_update', {
        scheme: 'bcrypt',
        reason: 'deprecated',
      });
    });

    it('flags rounds outside the policy window', () => {
      expect(ctx.needsUpdate(shaHash)).toBe(false);
      expect(ctx.replace({ sha256_crypt__min_rounds: 1500 }).needsUpdate(shaHash)).toBe(true);
      expect(ctx.replace({ all__max_rounds: 999 }).needsUpdate(shaHash)).toBe(true);
    });

    it('takes category options into account', () => {
      const admin = ctx.replace({ admin__min_rounds: 1500 });
      expect(admin.needsUpdate(shaHash)).toBe(false);
      expect(admin.needsUpdate(shaHash, { category: 'admin' })).toBe(true);
    });

    it('returns a replacement only for valid, outdated hashes', () => {
      expect(ctx.verifyAndUpdate('password', bcryptHash)).toEqual({ valid: true, replacement: shaHash });
      expect(ctx.verifyAndUpdate('password', shaHash)).toEqual({ valid: true });
      expect(ctx.verifyAndUpdate('wrong', bcryptHash)).toEqual({ valid: false });
      expect(ctx.verifyAndUpdate('password', null)).toEqual({ valid: false });
    });
  });
});

describe('CryptContext over every built-in scheme', () => {
  const names = BUILTIN_HANDLERS.map((handler) => handler.name);
  const everything = new CryptContext(
    {
      schemes: names,
      all__default_rounds: 1000,
      bcrypt__default_rounds: 4,
    },
    deps,
  );

  it.each(names)('%s: verifies its own hash and rejects a wrong secret', (scheme) => {
    const hash = everything.encrypt('correct horse', { scheme });
    expect(everything.identify(hash)).toBe(scheme);
    expect(everything.verify('correct horse', hash)).toBe(true);
    expect(everything.verify('wrong horse', hash)).toBe(false);
  });
});
