/**
 * Password-based key derivation and verification.
 *
 * A password is stretched with scrypt into a master secret that never leaves
 * this module. Two subkeys are split off it with HKDF: the verifier, which is
 * stored so later logins can be checked, and the encryption key, which only
 * ever lives inside a session. Knowing the verifier does not reveal the
 * encryption key.
 */

import { timingSafeEqual } from 'crypto';
import { hkdf } from '@noble/hashes/hkdf.js';
import { scryptAsync } from '@noble/hashes/scrypt.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { randomBytes, utf8ToBytes } from '@noble/hashes/utils.js';
import { KeyDerivationAbortedError } from '../errors';
import {
  type DeriveOptions,
  type ScryptParams,
  KEY_LENGTH,
  SALT_BYTES,
  SCRYPT_PARAMS,
  SUBKEY_INFO,
} from './types';

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 32;

/** ASCII punctuation accepted in passwords */
export const PASSWORD_SYMBOLS = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

export const PASSWORD_REQUIREMENTS =
  'Password requirements:\n' +
  `   * Length between ${PASSWORD_MIN_LENGTH} and ${PASSWORD_MAX_LENGTH}\n` +
  '   * Upper and lowercase Latin letters,\n' +
  '     numbers and any of the following symbols:\n' +
  `    ${PASSWORD_SYMBOLS}`;

const ALLOWED_CHARACTERS = new Set(
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789' + PASSWORD_SYMBOLS
);

/**
 * Key material for one successful authentication.
 *
 * Both buffers are owned by the holder and cleared by {@link Credential.wipe}.
 */
export class Credential {
  private wiped = false;

  constructor(
    readonly verifier: Uint8Array,
    readonly encryptionKey: Uint8Array
  ) {}

  get isWiped(): boolean {
    return this.wiped;
  }

  /** Best-effort zeroing of both subkeys. */
  wipe(): void {
    this.verifier.fill(0);
    this.encryptionKey.fill(0);
    this.wiped = true;
  }
}

/**
 * Derives and checks password credentials.
 *
 * Stateless apart from the scrypt parameters, which default to
 * {@link SCRYPT_PARAMS}. Tests pass cheaper parameters.
 */
export class CredentialManager {
  constructor(private readonly params: ScryptParams = SCRYPT_PARAMS) {}

  /**
   * Length within [8, 32] and only ASCII letters, digits and punctuation.
   */
  meetsRequirements(password: string): boolean {
    // Iterate code points so astral characters count once and are rejected
    const chars = Array.from(password);
    if (chars.length < PASSWORD_MIN_LENGTH || chars.length > PASSWORD_MAX_LENGTH) {
      return false;
    }
    return chars.every((c) => ALLOWED_CHARACTERS.has(c));
  }

  /**
   * Generate a URL-safe random salt.
   *
   * @returns 16 random bytes as unpadded base64url
   */
  generateSalt(): string {
    return Buffer.from(randomBytes(SALT_BYTES)).toString('base64url');
  }

  /**
   * Run the KDF once and split the result into both subkeys.
   */
  async deriveCredential(
    password: string,
    salt: string,
    options: DeriveOptions = {}
  ): Promise<Credential> {
    const master = await this.stretch(password, salt, options);
    try {
      return new Credential(
        hkdf(sha256, master, undefined, SUBKEY_INFO.verifier, KEY_LENGTH),
        hkdf(sha256, master, undefined, SUBKEY_INFO.encryption, KEY_LENGTH)
      );
    } finally {
      master.fill(0);
    }
  }

  /**
   * Derive the 32-byte password verifier for (password, salt).
   *
   * Deterministic; different salts give independent outputs.
   */
  async deriveKey(password: string, salt: string, options: DeriveOptions = {}): Promise<Uint8Array> {
    const credential = await this.deriveCredential(password, salt, options);
    const verifier = Uint8Array.from(credential.verifier);
    credential.wipe();
    return verifier;
  }

  /**
   * Check a password against a stored verifier. Never throws on mismatch.
   */
  async verify(
    password: string,
    salt: string,
    expected: Uint8Array,
    options: DeriveOptions = {}
  ): Promise<boolean> {
    const credential = await this.authenticate(password, salt, expected, options);
    if (!credential) return false;
    credential.wipe();
    return true;
  }

  /**
   * Verify a password and, on success, hand back the credential so the caller
   * does not pay for a second KDF run.
   *
   * @returns The credential, or null when the password does not match
   */
  async authenticate(
    password: string,
    salt: string,
    expected: Uint8Array,
    options: DeriveOptions = {}
  ): Promise<Credential | null> {
    const credential = await this.deriveCredential(password, salt, options);
    if (constantTimeEqual(credential.verifier, expected)) {
      return credential;
    }
    credential.wipe();
    return null;
  }

  private async stretch(password: string, salt: string, options: DeriveOptions): Promise<Uint8Array> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new KeyDerivationAbortedError();
    }

    try {
      return await scryptAsync(utf8ToBytes(password), utf8ToBytes(salt), {
        N: this.params.N,
        r: this.params.r,
        p: this.params.p,
        dkLen: this.params.dkLen,
        onProgress: signal
          ? () => {
              if (signal.aborted) throw new KeyDerivationAbortedError();
            }
          : undefined,
      });
    } catch (error) {
      if (signal?.aborted) throw new KeyDerivationAbortedError();
      throw error;
    }
  }
}

/**
 * Constant-time byte comparison; false on length mismatch.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
