/**
 * The authenticated session: the only holder of the note encryption key.
 */

import { Cipher } from '../vault/cipher';
import type { Credential } from '../vault/credentials';

export class Session {
  private cipher: Cipher | null;

  /**
   * Takes over the credential's encryption key. The credential is wiped.
   */
  constructor(credential: Credential) {
    try {
      this.cipher = new Cipher(credential.encryptionKey);
    } finally {
      credential.wipe();
    }
  }

  get isActive(): boolean {
    return this.cipher !== null;
  }

  /**
   * Encrypt a note body, bound to its title.
   */
  encrypt(body: string, title: string): string {
    return this.requireCipher().encrypt(body, title);
  }

  /**
   * @throws CipherError when the token was not written under this key and title
   */
  decrypt(token: string, title: string): string {
    return this.requireCipher().decrypt(token, title);
  }

  /** Wipe the key. Idempotent. */
  end(): void {
    this.cipher?.destroy();
    this.cipher = null;
  }

  private requireCipher(): Cipher {
    if (!this.cipher) {
      throw new Error('Session has ended');
    }
    return this.cipher;
  }
}
