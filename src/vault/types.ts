/**
 * Vault key derivation and encryption types.
 *
 * Key Hierarchy:
 *   Password + Salt
 *       ↓ (scrypt)
 *   Master Secret (never stored)
 *       ↓ (HKDF-SHA256, two labels)
 *   Verifier Subkey  → persisted as the password verifier
 *   Encryption Subkey → AES-256-GCM key for note bodies
 */

/** scrypt parameters for key derivation */
export interface ScryptParams {
  /** CPU/memory cost, a power of two */
  N: number;
  /** Block size */
  r: number;
  /** Parallelism */
  p: number;
  /** Output length in bytes */
  dkLen: number;
}

/** Fixed vault parameters: N=2^14, r=8, p=1, 32-byte output */
export const SCRYPT_PARAMS: ScryptParams = {
  N: 2 ** 14,
  r: 8,
  p: 1,
  dkLen: 32,
};

/** Length of every derived key and of the persisted verifier */
export const KEY_LENGTH = 32;

/** Random bytes behind each salt (encoded to 22 base64url chars) */
export const SALT_BYTES = 16;

/** HKDF labels separating the two subkeys */
export const SUBKEY_INFO = {
  verifier: 'notevault/v1/password-verifier',
  encryption: 'notevault/v1/note-encryption',
} as const;

export interface DeriveOptions {
  /** Abandons the derivation; the promise rejects with KeyDerivationAbortedError */
  signal?: AbortSignal;
}
