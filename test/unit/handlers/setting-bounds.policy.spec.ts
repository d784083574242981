import { describe, it, expect } from 'vitest';
import { linearRounds } from '../../../src/modules/handlers/capabilities/rounds';
import { byteSalt, charSalt } from '../../../src/modules/handlers/capabilities/salt';
import {
  normalizeRounds,
  normalizeSalt,
  normalizeSaltSize,
} from '../../../src/modules/handlers/policies/setting-bounds.policy';
import { expectPasshashError } from '../../helpers/expect-passhash-error';
import { fixedRandom } from '../../helpers/fixed-random';
import { spyOnWarnings } from '../../helpers/spy-logger';

describe('normalizeRounds', () => {
  const rounds = linearRounds({ min: 1000, max: 10000, default: 5000 });

  it('falls back to the default when unset', () => {
    expect(normalizeRounds(undefined, rounds, { scheme: 'test' })).toBe(5000);
  });

  it('raises on an unset value when defaults are disabled', () => {
    expectPasshashError(
      () => normalizeRounds(undefined, rounds, { scheme: 'test', useDefaults: false }),
      'SETTING_OUT_OF_RANGE',
    );
  });

  it('passes values inside the bounds through', () => {
    const warn = spyOnWarnings();
    expect(normalizeRounds(1000, rounds, { scheme: 'test', strict: true })).toBe(1000);
    expect(normalizeRounds(10000, rounds, { scheme: 'test', strict: true })).toBe(10000);
    expect(warn).not.toHaveBeenCalled();
  });

  it('clamps below the minimum in relaxed mode and warns', () => {
    const warn = spyOnWarnings();
    expect(normalizeRounds(500, rounds, { scheme: 'test' })).toBe(1000);
    expect(warn).toHaveBeenCalledWith('settings.rounds_clamped', {
      scheme: 'test',
      setting: 'rounds',
      requested: 500,
      applied: 1000,
    });
  });

  it('clamps above the maximum in relaxed mode', () => {
    expect(normalizeRounds(20000, rounds, { scheme: 'test' })).toBe(10000);
  });

  it('raises out-of-range values in strict mode', () => {
    expectPasshashError(
      () => normalizeRounds(500, rounds, { scheme: 'test', strict: true }),
      'SETTING_OUT_OF_RANGE',
    );
    expectPasshashError(
      () => normalizeRounds(20000, rounds, { scheme: 'test', strict: true }),
      'SETTING_OUT_OF_RANGE',
    );
  });

  it('raises below the minimum when the capability has strict bounds', () => {
    const strictBounds = linearRounds({ min: 1000, max: 10000, default: 5000, strictBounds: true });
    expectPasshashError(
      () => normalizeRounds(500, strictBounds, { scheme: 'test' }),
      'SETTING_OUT_OF_RANGE',
    );
    expect(normalizeRounds(20000, strictBounds, { scheme: 'test' })).toBe(10000);
  });

  it('raises on non-integer rounds', () => {
    expectPasshashError(() => normalizeRounds(1500.5, rounds, { scheme: 'test' }), 'SETTING_OUT_OF_RANGE');
  });

  it('logs under a caller-supplied event name', () => {
    const warn = spyOnWarnings();
    normalizeRounds(500, rounds, { scheme: 'test', event: 'policy.rounds_clamped' });
    expect(warn).toHaveBeenCalledWith('policy.rounds_clamped', expect.objectContaining({ applied: 1000 }));
  });
});

describe('normalizeSalt / normalizeSaltSize', () => {
  const salt = charSalt({ minSize: 2, maxSize: 8, defaultSize: 4, charset: 'abc' });
  const random = fixedRandom();

  it('generates a salt of the default size when unset', () => {
    expect(normalizeSalt(undefined, salt, { scheme: 'test', random })).toBe('aaaa');
  });

  it('generates a salt of the requested size', () => {
    expect(normalizeSalt(undefined, salt, { scheme: 'test', random, saltSize: 6 })).toBe('aaaaaa');
  });

  it('clamps an oversized salt size in relaxed mode', () => {
    const warn = spyOnWarnings();
    expect(normalizeSalt(undefined, salt, { scheme: 'test', random, saltSize: 20 })).toBe('aaaaaaaa');
    expect(warn).toHaveBeenCalledWith('settings.salt_size_clamped', {
      scheme: 'test',
      setting: 'saltSize',
      requested: 20,
      applied: 8,
    });
  });

  it('raises on an out-of-range salt size in strict mode', () => {
    expectPasshashError(
      () => normalizeSaltSize(20, salt, { scheme: 'test', strict: true }),
      'SETTING_OUT_OF_RANGE',
    );
    expect(normalizeSaltSize(1, salt, { scheme: 'test' })).toBe(2);
  });

  it('accepts a valid salt unchanged', () => {
    expect(normalizeSalt('abcab', salt, { scheme: 'test', strict: true })).toBe('abcab');
  });

  it('rejects characters outside the charset and non-string salts', () => {
    expectPasshashError(() => normalizeSalt('abd', salt, { scheme: 'test' }), 'SETTING_OUT_OF_RANGE');
    expectPasshashError(
      () => normalizeSalt(Buffer.from('ab'), salt, { scheme: 'test' }),
      'SETTING_OUT_OF_RANGE',
    );
  });

  it('accepts any character not forbidden, but generates from the charset', () => {
    const open = charSalt({ minSize: 0, maxSize: 8, defaultSize: 4, charset: 'abc', forbiddenChars: ':$' });
    expect(normalizeSalt('x-y_z!', open, { scheme: 'test', strict: true })).toBe('x-y_z!');
    expectPasshashError(() => normalizeSalt('ab:c', open, { scheme: 'test' }), 'SETTING_OUT_OF_RANGE');
    expectPasshashError(() => normalizeSalt('ab$c', open, { scheme: 'test' }), 'SETTING_OUT_OF_RANGE');
    expect(normalizeSalt(undefined, open, { scheme: 'test', random })).toBe('aaaa');
  });

  it('always rejects a salt below the minimum size', () => {
    expectPasshashError(() => normalizeSalt('a', salt, { scheme: 'test' }), 'SETTING_OUT_OF_RANGE');
  });

  it('truncates an oversized salt in relaxed mode only', () => {
    const warn = spyOnWarnings();
    expect(normalizeSalt('abcabcabcabc', salt, { scheme: 'test' })).toBe('abcabcab');
    expect(warn).toHaveBeenCalledWith('settings.salt_truncated', {
      scheme: 'test',
      setting: 'salt',
      requested: 12,
      applied: 8,
    });
    expectPasshashError(
      () => normalizeSalt('abcabcabcabc', salt, { scheme: 'test', strict: true }),
      'SETTING_OUT_OF_RANGE',
    );
  });

  it('takes string salts as UTF-8 bytes for byte salts', () => {
    const bytes = byteSalt({ maxSize: 4 });
    expect(normalizeSalt('ab', bytes, { scheme: 'test' })).toEqual(Buffer.from('ab'));
    expect(normalizeSalt(undefined, bytes, { scheme: 'test', random })).toEqual(Buffer.alloc(4, 0xab));
  });

  it('rewrites a salt into its canonical spelling', () => {
    const warn = spyOnWarnings();
    const canonical = charSalt({ maxSize: 2, charset: 'abAB', canonicalize: (s) => s.toUpperCase() });
    expect(normalizeSalt('ab', canonical, { scheme: 'test' })).toBe('AB');
    expect(warn).toHaveBeenCalledWith('settings.salt_repaired', { scheme: 'test', setting: 'salt' });
  });
});
