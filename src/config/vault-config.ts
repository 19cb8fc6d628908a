/**
 * Persistent vault configuration: the salt and the password verifier.
 *
 * Two files live in the storage directory:
 *   config.json  {"storage_path": ..., "password_salt": ...}
 *   hash         raw 32-byte verifier
 *
 * Both exist once a password has been set, neither before. Finding only one
 * of them means the vault is corrupt.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { ConfigIOError, ConfigParseError, errorMessage } from '../errors';
import { KEY_LENGTH } from '../vault/types';
import { atomicWriteFile, removeIfExists } from './atomic-fs';
import {
  CONFIG_FILE_NAME,
  VERIFIER_FILE_NAME,
  PersistedConfigSchema,
  describeIssues,
  type PersistedConfig,
} from './schema';

export class VaultConfig {
  private passwordVerifier: Uint8Array | null;

  private constructor(
    readonly storagePath: string,
    private salt: string,
    verifier: Uint8Array | null
  ) {
    this.passwordVerifier = verifier;
  }

  /**
   * True if either config file is present in the directory.
   */
  static exists(storagePath: string): boolean {
    return (
      existsSync(join(storagePath, CONFIG_FILE_NAME)) ||
      existsSync(join(storagePath, VERIFIER_FILE_NAME))
    );
  }

  /**
   * Load an initialized vault's configuration. Never substitutes defaults.
   *
   * @throws ConfigParseError on malformed JSON, a schema violation, a missing
   *   companion file, or a verifier of the wrong size
   * @throws ConfigIOError when a file cannot be read
   */
  static async load(storagePath: string): Promise<VaultConfig> {
    const configPath = join(storagePath, CONFIG_FILE_NAME);
    const verifierPath = join(storagePath, VERIFIER_FILE_NAME);

    const rawConfig = await readOptional(configPath);
    const verifier = await readOptional(verifierPath);

    if (rawConfig === null && verifier === null) {
      throw new ConfigParseError(`No vault configuration found in ${storagePath}`);
    }
    if (rawConfig === null) {
      throw new ConfigParseError(`${VERIFIER_FILE_NAME} exists without ${CONFIG_FILE_NAME}`);
    }
    if (verifier === null) {
      throw new ConfigParseError(`${CONFIG_FILE_NAME} exists without ${VERIFIER_FILE_NAME}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(rawConfig.toString('utf8'));
    } catch (err) {
      throw new ConfigParseError(`${CONFIG_FILE_NAME} is not valid JSON: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = PersistedConfigSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigParseError(`${CONFIG_FILE_NAME} is invalid: ${describeIssues(parsed.error)}`, {
        cause: parsed.error,
      });
    }

    if (verifier.length !== KEY_LENGTH) {
      throw new ConfigParseError(
        `${VERIFIER_FILE_NAME} must hold ${KEY_LENGTH} bytes, found ${verifier.length}`
      );
    }

    return new VaultConfig(storagePath, parsed.data.password_salt, new Uint8Array(verifier));
  }

  /**
   * Configuration for a vault that has never had a password. Nothing is
   * written until {@link VaultConfig.save}.
   */
  static initialize(storagePath: string, salt: string): VaultConfig {
    return new VaultConfig(storagePath, salt, null);
  }

  get passwordSalt(): string {
    return this.salt;
  }

  /** The stored verifier, or null before a password has been set */
  get verifier(): Uint8Array | null {
    return this.passwordVerifier;
  }

  get isInitialized(): boolean {
    return this.passwordVerifier !== null;
  }

  get configPath(): string {
    return join(this.storagePath, CONFIG_FILE_NAME);
  }

  get verifierPath(): string {
    return join(this.storagePath, VERIFIER_FILE_NAME);
  }

  /**
   * Record a verifier. Calling again overwrites it (password change).
   */
  setVerifier(verifier: Uint8Array): void {
    if (verifier.length !== KEY_LENGTH) {
      throw new Error(`Verifier must be ${KEY_LENGTH} bytes, got ${verifier.length}`);
    }
    this.passwordVerifier = Uint8Array.from(verifier);
  }

  /**
   * Persist both files. The verifier goes first so config.json only appears
   * once its companion is complete.
   *
   * @throws ConfigIOError when either write fails
   */
  async save(): Promise<void> {
    if (!this.passwordVerifier) {
      throw new Error('Cannot save a vault configuration without a password verifier');
    }

    const persisted: PersistedConfig = {
      storage_path: this.storagePath,
      password_salt: this.salt,
    };

    try {
      await atomicWriteFile(this.verifierPath, this.passwordVerifier);
      await atomicWriteFile(this.configPath, JSON.stringify(persisted, null, 2) + '\n');
    } catch (err) {
      throw new ConfigIOError(`Failed to save vault configuration: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Forget the verifier, zeroing the held copy. */
  clearVerifier(): void {
    this.passwordVerifier?.fill(0);
    this.passwordVerifier = null;
  }

  /**
   * Delete both files and forget the verifier. A fresh salt is taken for the
   * next vault created in this directory.
   *
   * The verifier goes first; if config.json then cannot be removed the
   * verifier is written back, so the directory never holds only one file.
   *
   * @throws ConfigIOError when either file cannot be removed
   */
  async erase(nextSalt: string): Promise<void> {
    try {
      await removeIfExists(this.verifierPath);
    } catch (err) {
      throw new ConfigIOError(`Failed to erase vault configuration: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      await removeIfExists(this.configPath);
    } catch (err) {
      const restored = await this.restoreVerifierFile();
      const detail = restored ? '' : `; ${this.verifierPath} could not be restored`;
      throw new ConfigIOError(`Failed to erase vault configuration: ${errorMessage(err)}${detail}`, {
        cause: err,
      });
    }

    this.clearVerifier();
    this.salt = nextSalt;
  }

  private async restoreVerifierFile(): Promise<boolean> {
    if (!this.passwordVerifier) return true;
    try {
      await atomicWriteFile(this.verifierPath, this.passwordVerifier);
      return true;
    } catch {
      return false;
    }
  }
}

async function readOptional(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw new ConfigIOError(`Failed to read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}
