/**
 * AES-256-GCM encryption for note bodies.
 *
 * Token layout (base64url, unpadded):
 *   version (1 byte) | nonce (12 bytes) | ciphertext | tag (16 bytes)
 *
 * The version byte and the optional context string are authenticated, so a
 * token cannot be relabelled or moved to another context without failing.
 */

import { createCipheriv, createDecipheriv } from 'crypto';
import { randomBytes } from '@noble/hashes/utils.js';
import { CipherError } from '../errors';
import { KEY_LENGTH } from './types';

const ALGORITHM = 'aes-256-gcm';
const TOKEN_VERSION = 0x01;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;
const HEADER_LENGTH = 1 + NONCE_LENGTH;

/**
 * Session-scoped authenticated encryption.
 *
 * Holds its own copy of the key; {@link Cipher.destroy} zeroes it and any
 * later call is a programming error.
 */
export class Cipher {
  private readonly key: Buffer;
  private destroyed = false;

  constructor(key: Uint8Array) {
    if (key.length !== KEY_LENGTH) {
      throw new Error(`Cipher key must be ${KEY_LENGTH} bytes, got ${key.length}`);
    }
    this.key = Buffer.from(key);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Encrypt text into a self-contained token. A fresh nonce is drawn on every
   * call, so equal inputs give different tokens.
   *
   * @param plaintext - Any string, including the empty string
   * @param context - Optional associated data that must be supplied again to decrypt
   */
  encrypt(plaintext: string, context = ''): string {
    this.assertUsable();
    const header = Buffer.alloc(HEADER_LENGTH);
    header[0] = TOKEN_VERSION;
    header.set(randomBytes(NONCE_LENGTH), 1);

    const cipher = createCipheriv(ALGORITHM, this.key, header.subarray(1), {
      authTagLength: TAG_LENGTH,
    });
    cipher.setAAD(associatedData(header[0], context));
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    return Buffer.concat([header, ciphertext, cipher.getAuthTag()]).toString('base64url');
  }

  /**
   * Decrypt a token produced by {@link Cipher.encrypt} under the same key.
   *
   * @throws CipherError on malformed tokens, unknown versions, a wrong key,
   *   a wrong context, or any tampering. Never returns partial plaintext.
   */
  decrypt(token: string, context = ''): string {
    this.assertUsable();
    const bytes = Buffer.from(token, 'base64url');

    // Node's decoder skips characters it does not understand; insist on the
    // canonical encoding so every edit to the text is an edit to the bytes.
    if (bytes.toString('base64url') !== token) {
      throw new CipherError('Malformed token');
    }
    if (bytes.length < HEADER_LENGTH + TAG_LENGTH) {
      throw new CipherError('Token is too short');
    }
    if (bytes[0] !== TOKEN_VERSION) {
      throw new CipherError(`Unsupported token version ${bytes[0]}`);
    }

    const nonce = bytes.subarray(1, HEADER_LENGTH);
    const ciphertext = bytes.subarray(HEADER_LENGTH, bytes.length - TAG_LENGTH);
    const tag = bytes.subarray(bytes.length - TAG_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, nonce, {
        authTagLength: TAG_LENGTH,
      });
      decipher.setAAD(associatedData(bytes[0], context));
      decipher.setAuthTag(tag);
      const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
      return plaintext.toString('utf8');
    } catch (error) {
      throw new CipherError('Token failed authentication', { cause: error });
    }
  }

  /** Zero the key. Idempotent. */
  destroy(): void {
    this.key.fill(0);
    this.destroyed = true;
  }

  private assertUsable(): void {
    if (this.destroyed) {
      throw new Error('Cipher has been destroyed');
    }
  }
}

function associatedData(version: number, context: string): Buffer {
  return Buffer.concat([Buffer.from([version]), Buffer.from(context, 'utf8')]);
}
