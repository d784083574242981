import type { PasswordHandler } from '../handlers/handler.types';
import { atlassianPbkdf2Sha1 } from '../handlers/schemes/atlassian-pbkdf2';
import { bcryptHandler } from '../handlers/schemes/bcrypt';
import { ctaPbkdf2Sha1 } from '../handlers/schemes/cta-pbkdf2';
import { dlitzPbkdf2Sha1 } from '../handlers/schemes/dlitz-pbkdf2';
import { grubPbkdf2Sha512 } from '../handlers/schemes/grub-pbkdf2';
import {
  ldapPbkdf2Sha1,
  ldapPbkdf2Sha256,
  ldapPbkdf2Sha512,
  pbkdf2Sha1,
  pbkdf2Sha256,
  pbkdf2Sha512,
} from '../handlers/schemes/pbkdf2';
import { sha256Crypt, sha512Crypt } from '../handlers/schemes/sha-crypt';

/** Every handler shipped with the library, in registration order. */
export const BUILTIN_HANDLERS: readonly PasswordHandler[] = Object.freeze([
  pbkdf2Sha1,
  pbkdf2Sha256,
  pbkdf2Sha512,
  ldapPbkdf2Sha1,
  ldapPbkdf2Sha256,
  ldapPbkdf2Sha512,
  ctaPbkdf2Sha1,
  dlitzPbkdf2Sha1,
  atlassianPbkdf2Sha1,
  grubPbkdf2Sha512,
  sha256Crypt,
  sha512Crypt,
  bcryptHandler,
]);
