import { describe, it, expect } from 'vitest';
import { ContextPasswordHasher } from '../../../src/modules/context/context-password-hasher';
import { CryptContext } from '../../../src/modules/context/crypt-context';
import { bcryptHandler } from '../../../src/modules/handlers/schemes/bcrypt';
import { BUILTIN_HANDLERS } from '../../../src/modules/registry/builtin-handlers';
import { HandlerRegistry } from '../../../src/modules/registry/handler.registry';
import { fixedRandom } from '../../helpers/fixed-random';

describe('ContextPasswordHasher', () => {
  const context = new CryptContext(
    {
      schemes: 'sha256_crypt, bcrypt',
      deprecated: 'bcrypt',
      sha256_crypt__default_rounds: 1000,
      admin__min_rounds: 2000,
    },
    { registry: new HandlerRegistry(BUILTIN_HANDLERS), random: fixedRandom() },
  );
  const hasher = new ContextPasswordHasher(context);

  it('hashes with the context default', async () => {
    await expect(hasher.hash('password')).resolves.toBe(context.encrypt('password'));
  });

  it('verifies through the context', async () => {
    const hash = await hasher.hash('password');
    await expect(hasher.verify('password', hash)).resolves.toBe(true);
    await expect(hasher.verify('wrong', hash)).resolves.toBe(false);
  });

  it('treats unknown and empty hashes as a failed check', async () => {
    await expect(hasher.verify('password', '$6$saltstring$abc')).resolves.toBe(false);
    await expect(hasher.verify('password', '')).resolves.toBe(false);
  });

  it('asks for a rehash of deprecated or unrecognized hashes', async () => {
    const legacy = bcryptHandler.encrypt('password', { salt: '.'.repeat(22), rounds: 4 });
    await expect(hasher.needsRehash(legacy)).resolves.toBe(true);
    await expect(hasher.needsRehash('$6$saltstring$abc')).resolves.toBe(true);
    await expect(hasher.needsRehash(await hasher.hash('password'))).resolves.toBe(false);
  });

  it('applies its category to hashing and rehash checks', async () => {
    const admin = new ContextPasswordHasher(context, { category: 'admin' });
    const adminHash = await admin.hash('password');

    expect(adminHash.startsWith('$5$rounds=2000$')).toBe(true);
    await expect(admin.needsRehash(await hasher.hash('password'))).resolves.toBe(true);
    await expect(admin.needsRehash(adminHash)).resolves.toBe(false);
  });
});
