/**
 * Vault cryptography module.
 *
 * ```
 * Password + Salt
 *     ↓ (scrypt, N=2^14, r=8, p=1)
 * Master Secret
 *     ↓ (HKDF-SHA256)
 * Verifier Subkey (stored)   Encryption Subkey (session only)
 *                                ↓ (AES-256-GCM)
 *                            Note Bodies
 * ```
 *
 * @example
 * ```typescript
 * import { CredentialManager, Cipher } from './vault';
 *
 * const credentials = new CredentialManager();
 * const salt = credentials.generateSalt();
 * const verifier = await credentials.deriveKey('Str0ng!Pass', salt);
 *
 * // Later: log in
 * const credential = await credentials.authenticate('Str0ng!Pass', salt, verifier);
 * if (credential) {
 *   const cipher = new Cipher(credential.encryptionKey);
 *   const token = cipher.encrypt('groceries: eggs, milk');
 *   cipher.decrypt(token); // 'groceries: eggs, milk'
 * }
 * ```
 */

export {
  Credential,
  CredentialManager,
  constantTimeEqual,
  PASSWORD_REQUIREMENTS,
  PASSWORD_MIN_LENGTH,
  PASSWORD_MAX_LENGTH,
  PASSWORD_SYMBOLS,
} from './credentials';

export { Cipher } from './cipher';

export {
  type ScryptParams,
  type DeriveOptions,
  SCRYPT_PARAMS,
  KEY_LENGTH,
  SALT_BYTES,
  SUBKEY_INFO,
} from './types';
