/**
 * src/index.ts
 *
 * Public entrypoint. Apps usually need only buildConfig + buildDeps, or a CryptContext.
 */

export { buildConfig } from './app/config';
export type { AppConfig, NodeEnv } from './app/config';
export { buildDeps, buildPolicy } from './app/di';
export type { AppDeps } from './app/di';

export { PasshashError, isPasshashError, PASSHASH_ERROR_CODES } from './shared/errors/errors';
export type { PasshashErrorCode } from './shared/errors/errors';
export type { PasswordHasher } from './shared/security/password-hasher';
export { cryptoRandom } from './shared/security/random';
export type { RandomSource } from './shared/security/random';

export {
  Base64Engine,
  ab64,
  bcrypt64,
  ctaB64,
  h64,
  h64big,
  stdB64,
  AB64_CHARS,
  BCRYPT64_CHARS,
  CTA_B64_CHARS,
  HASH64_CHARS,
  STD_B64_CHARS,
} from './modules/codecs/base64-engine';
export { FieldGrammar } from './modules/codecs/field-grammar';
export type { FieldGrammarOptions, ParsedFields } from './modules/codecs/field-grammar';
export { createHexCodec, upperHex } from './modules/codecs/hex';

export type {
  HandlerSpec,
  HashContext,
  HashOptions,
  HashRecord,
  PasswordHandler,
  RoundsCapability,
  Salt,
  SaltCapability,
  Secret,
  SettingKeyword,
} from './modules/handlers/handler.types';
export { isPasswordHandler } from './modules/handlers/handler.types';
export { GenericHandler } from './modules/handlers/generic-handler';
export { PrefixWrapper } from './modules/handlers/prefix-wrapper';
export { byteSalt, charSalt, noSalt } from './modules/handlers/capabilities/salt';
export { fixedRounds, linearRounds, log2Rounds } from './modules/handlers/capabilities/rounds';
export {
  normalizeRounds,
  normalizeSalt,
  normalizeSaltSize,
} from './modules/handlers/policies/setting-bounds.policy';
export {
  bytesField,
  charsField,
  fieldFormat,
  transposedField,
} from './modules/handlers/formats/field-format';

export {
  createPbkdf2Handler,
  ldapPbkdf2Sha1,
  ldapPbkdf2Sha256,
  ldapPbkdf2Sha512,
  pbkdf2Sha1,
  pbkdf2Sha256,
  pbkdf2Sha512,
} from './modules/handlers/schemes/pbkdf2';
export { ctaPbkdf2Sha1 } from './modules/handlers/schemes/cta-pbkdf2';
export { dlitzPbkdf2Sha1 } from './modules/handlers/schemes/dlitz-pbkdf2';
export { atlassianPbkdf2Sha1 } from './modules/handlers/schemes/atlassian-pbkdf2';
export { grubPbkdf2Sha512 } from './modules/handlers/schemes/grub-pbkdf2';
export { sha256Crypt, sha512Crypt } from './modules/handlers/schemes/sha-crypt';
export { bcryptHandler } from './modules/handlers/schemes/bcrypt';

export {
  HandlerRegistry,
  getDefaultRegistry,
  initializeRegistry,
} from './modules/registry/handler.registry';
export { BUILTIN_HANDLERS } from './modules/registry/builtin-handlers';

export { Policy } from './modules/policy/policy';
export type { PolicySource } from './modules/policy/policy';
export type { PolicyMapping, PolicyOptions, VaryRounds } from './modules/policy/policy.types';

export { CryptContext } from './modules/context/crypt-context';
export type {
  ContextDeps,
  EncryptOptions,
  VerifyAndUpdateResult,
  VerifyOptions,
} from './modules/context/crypt-context';
export { ContextPasswordHasher } from './modules/context/context-password-hasher';
