/**
 * Vault bootstrap: validate the storage directory, load or start the
 * configuration, open the record store.
 */

import { mkdirSync, statSync } from 'fs';
import { VaultConfig } from '../config/vault-config';
import { RecordStore, getDbPath } from '../db';
import { StorageDirectoryError, errorMessage } from '../errors';
import { type VaultLogger, createSilentLogger } from '../logging/vault-logger';
import { CredentialManager } from '../vault';
import { AccessStateMachine } from './access-machine';

export interface OpenVaultOptions {
  storageDir: string;
  /** Create the directory when it does not exist (default storage location only) */
  createIfMissing?: boolean;
  credentials?: CredentialManager;
  logger?: VaultLogger;
}

/**
 * @throws StorageDirectoryError when the directory is missing or not a directory
 * @throws ConfigParseError / ConfigIOError when an existing configuration is unusable
 * @throws StorageIOError when the record store cannot be opened
 */
export async function openVault(options: OpenVaultOptions): Promise<AccessStateMachine> {
  const { storageDir } = options;
  const credentials = options.credentials ?? new CredentialManager();
  const logger = options.logger ?? createSilentLogger();

  ensureStorageDir(storageDir, options.createIfMissing ?? false);

  const config = VaultConfig.exists(storageDir)
    ? await VaultConfig.load(storageDir)
    : VaultConfig.initialize(storageDir, credentials.generateSalt());

  const store = RecordStore.open(getDbPath(storageDir));
  logger.vaultOpened(storageDir, config.isInitialized);

  return new AccessStateMachine({ config, store, credentials, logger });
}

function ensureStorageDir(storageDir: string, createIfMissing: boolean): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(storageDir).isDirectory();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw new StorageDirectoryError(`Cannot access ${storageDir}: ${errorMessage(err)}`, { cause: err });
    }
    if (!createIfMissing) {
      throw new StorageDirectoryError(`Storage directory does not exist: ${storageDir}`, { cause: err });
    }
    try {
      mkdirSync(storageDir, { recursive: true, mode: 0o700 });
    } catch (mkdirErr) {
      throw new StorageDirectoryError(
        `Cannot create storage directory ${storageDir}: ${errorMessage(mkdirErr)}`,
        { cause: mkdirErr }
      );
    }
    return;
  }

  if (!isDirectory) {
    throw new StorageDirectoryError(`Storage path is not a directory: ${storageDir}`);
  }
}
