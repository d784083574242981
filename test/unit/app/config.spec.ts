import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(buildConfig({})).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      serviceName: 'passhash',
      passhash: {
        schemes: ['pbkdf2_sha256', 'sha512_crypt', 'bcrypt'],
        defaultScheme: undefined,
        deprecated: undefined,
        policyPath: undefined,
        policySection: 'passhash',
      },
    });
  });

  it('reads the hashing settings', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      PASSHASH_SCHEMES: ' sha512_crypt , bcrypt ,',
      PASSHASH_DEFAULT_SCHEME: 'sha512_crypt',
      PASSHASH_DEPRECATED: 'bcrypt',
      PASSHASH_POLICY_PATH: '/etc/passhash/policy.ini',
      PASSHASH_POLICY_SECTION: 'hashing',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.logLevel).toBe('warn');
    expect(config.passhash).toEqual({
      schemes: ['sha512_crypt', 'bcrypt'],
      defaultScheme: 'sha512_crypt',
      deprecated: ['bcrypt'],
      policyPath: '/etc/passhash/policy.ini',
      policySection: 'hashing',
    });
  });

  it('rejects invalid values', () => {
    expect(() => buildConfig({ NODE_ENV: 'staging' })).toThrow();
    expect(() => buildConfig({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => buildConfig({ PASSHASH_SCHEMES: 'Bcrypt' })).toThrow();
  });
});
