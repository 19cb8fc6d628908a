/**
 * Error hierarchy for the vault.
 *
 * Config and storage-directory errors are fatal at startup; everything else
 * is recoverable inside a session and surfaces as a state transition.
 */

export class NoteVaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NoteVaultError';
  }
}

/** config.json or the verifier file is malformed or inconsistent */
export class ConfigParseError extends NoteVaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigParseError';
  }
}

export class ConfigIOError extends NoteVaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigIOError';
  }
}

export class StorageDirectoryError extends NoteVaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageDirectoryError';
  }
}

export class DuplicateTitleError extends NoteVaultError {
  readonly title: string;

  constructor(title: string) {
    super(`A note titled "${title}" already exists`);
    this.name = 'DuplicateTitleError';
    this.title = title;
  }
}

export class CipherError extends NoteVaultError {
  constructor(message = 'Token could not be decrypted', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CipherError';
  }
}

export class StorageIOError extends NoteVaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageIOError';
  }
}

export class KeyDerivationAbortedError extends NoteVaultError {
  constructor() {
    super('Key derivation aborted');
    this.name = 'KeyDerivationAbortedError';
  }
}

export class InvalidTransitionError extends NoteVaultError {
  readonly state: string;
  readonly intent: string;

  constructor(state: string, intent: string) {
    super(`Intent "${intent}" is not allowed in state ${state}`);
    this.name = 'InvalidTransitionError';
    this.state = state;
    this.intent = intent;
  }
}

export class StoreClosedError extends NoteVaultError {
  constructor() {
    super('RecordStore has been closed');
    this.name = 'StoreClosedError';
  }
}

/**
 * Errors that leave the vault unusable. The entry point turns these into a
 * non-zero exit code.
 */
export function isFatal(error: unknown): boolean {
  return (
    error instanceof ConfigParseError ||
    error instanceof ConfigIOError ||
    error instanceof StorageDirectoryError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
