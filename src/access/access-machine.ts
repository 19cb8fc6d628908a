/**
 * Access State Machine - drives the vault through its screens.
 *
 * One intent is processed at a time. Each call to {@link AccessStateMachine.dispatch}
 * either returns the next state or throws; a thrown intent leaves the state
 * untouched.
 *
 * In-session failures (wrong password, duplicate title, unreadable note,
 * storage write errors) become states. Config errors and programming errors
 * are thrown.
 */

import { VaultConfig } from '../config/vault-config';
import type { RecordStore } from '../db';
import {
  CipherError,
  ConfigIOError,
  DuplicateTitleError,
  InvalidTransitionError,
  NoteVaultError,
  StorageIOError,
  StoreClosedError,
  errorMessage,
} from '../errors';
import { type VaultLogger, createSilentLogger } from '../logging/vault-logger';
import { type DeriveOptions, CredentialManager, constantTimeEqual } from '../vault';
import type { Intent } from './intents';
import { Session } from './session';
import { type AccessState, type AuthenticatedState, holdsSession, isAuthenticated } from './states';

export interface AccessStateMachineOptions {
  config: VaultConfig;
  store: RecordStore;
  credentials?: CredentialManager;
  logger?: VaultLogger;
}

const LOGGED_ON: AccessState = { kind: 'LoggedOn' };

export class AccessStateMachine {
  private readonly config: VaultConfig;
  private readonly store: RecordStore;
  private readonly credentials: CredentialManager;
  private readonly logger: VaultLogger;

  private current: AccessState;
  private session: Session | null = null;
  private busy = false;
  private closed = false;

  constructor(options: AccessStateMachineOptions) {
    this.config = options.config;
    this.store = options.store;
    this.credentials = options.credentials ?? new CredentialManager();
    this.logger = options.logger ?? createSilentLogger();
    this.current = this.config.isInitialized ? { kind: 'LoggedOff' } : { kind: 'Empty' };
  }

  get state(): AccessState {
    return this.current;
  }

  get hasSession(): boolean {
    return this.session?.isActive ?? false;
  }

  get storageDir(): string {
    return this.config.storagePath;
  }

  /**
   * Titles of all notes, for the find and delete screens.
   *
   * @throws InvalidTransitionError outside the authenticated states
   */
  listTitles(): string[] {
    if (!isAuthenticated(this.current)) {
      throw new InvalidTransitionError(this.current.kind, 'listTitles');
    }
    return this.store.titles();
  }

  /**
   * Apply an intent to the current state.
   *
   * @param options - Passed to key derivation; an abort leaves the state unchanged
   * @throws InvalidTransitionError when the intent is not legal in the current state
   * @throws KeyDerivationAbortedError when the signal fires during derivation
   * @throws ConfigIOError when the configuration cannot be written
   */
  async dispatch(intent: Intent, options: DeriveOptions = {}): Promise<AccessState> {
    if (this.closed) {
      throw new StoreClosedError();
    }
    if (this.busy) {
      throw new Error(`Cannot dispatch "${intent.type}" while another intent is in progress`);
    }

    const from = this.current;
    this.busy = true;
    let next: AccessState;
    try {
      next = await this.transition(from, intent, options);
    } finally {
      this.busy = false;
    }

    this.current = next;
    this.logger.stateChanged(from.kind, next.kind, intent.type);
    return next;
  }

  /**
   * End any session and close the store. Safe to call more than once.
   */
  shutdown(): void {
    if (this.closed) return;
    if (this.session) {
      this.endSession('shutdown');
    }
    this.store.close();
    this.closed = true;
    this.current = this.config.isInitialized ? { kind: 'LoggedOff' } : { kind: 'Empty' };
  }

  private async transition(
    state: AccessState,
    intent: Intent,
    options: DeriveOptions
  ): Promise<AccessState> {
    switch (state.kind) {
      case 'Empty':
        if (intent.type === 'submitPassword') {
          return this.setInitialPassword(intent.password, options);
        }
        break;

      case 'InvalidNewPassword':
        if (intent.type === 'acknowledge') return { kind: 'Empty' };
        break;

      case 'LoggedOff':
        if (intent.type === 'submitPassword') {
          return this.login(intent.password, options);
        }
        break;

      case 'InvalidPassword':
        if (intent.type === 'acknowledge') return { kind: 'LoggedOff' };
        break;

      case 'ChangePassword':
        if (intent.type === 'submitPasswordChange') {
          return this.changePassword(intent.current, intent.next, options);
        }
        if (intent.type === 'cancel') return LOGGED_ON;
        if (intent.type === 'logoff') return this.logoff();
        break;

      case 'ConfirmHardReset':
        if (intent.type === 'confirmReset') {
          return this.hardReset(intent.password, options);
        }
        if (intent.type === 'cancel') return { kind: 'ConfirmHardResetFailed', reason: 'declined' };
        if (intent.type === 'logoff') return this.logoff();
        break;

      case 'ChangePasswordFailed':
      case 'ConfirmHardResetFailed':
        if (intent.type === 'acknowledge') return LOGGED_ON;
        if (intent.type === 'logoff') return this.logoff();
        break;

      case 'HardReset':
        if (intent.type === 'acknowledge') return { kind: 'Empty' };
        break;

      default:
        return this.authenticatedTransition(state, intent);
    }

    throw new InvalidTransitionError(state.kind, intent.type);
  }

  private authenticatedTransition(state: AuthenticatedState, intent: Intent): AccessState {
    switch (intent.type) {
      case 'selectAdd':
        return { kind: 'AddRecord' };
      case 'selectFind':
        return { kind: 'FindRecord' };
      case 'selectDelete':
        return { kind: 'DeleteRecord' };
      case 'requestPasswordChange':
        return { kind: 'ChangePassword' };
      case 'requestReset':
        return { kind: 'ConfirmHardReset' };
      case 'logoff':
        return this.logoff();

      case 'submitRecord':
        if (state.kind === 'AddRecord') return this.addRecord(intent.title, intent.body);
        break;
      case 'submitFind':
        if (state.kind === 'FindRecord') return this.findRecord(intent.title);
        break;
      case 'submitDelete':
        if (state.kind === 'DeleteRecord') return this.deleteRecord(intent.title);
        break;
      case 'cancel':
        if (state.kind === 'AddRecord' || state.kind === 'FindRecord' || state.kind === 'DeleteRecord') {
          return LOGGED_ON;
        }
        break;
      case 'acknowledge':
        if (state.kind === 'RecordFound' || state.kind === 'RecordNotFound') return LOGGED_ON;
        break;
    }

    throw new InvalidTransitionError(state.kind, intent.type);
  }

  // ---------------------------------------------------------------------------
  // Password setup and login
  // ---------------------------------------------------------------------------

  private async setInitialPassword(password: string, options: DeriveOptions): Promise<AccessState> {
    if (!this.credentials.meetsRequirements(password)) {
      return { kind: 'InvalidNewPassword' };
    }

    const verifier = await this.credentials.deriveKey(password, this.config.passwordSalt, options);
    this.config.setVerifier(verifier);
    verifier.fill(0);
    try {
      await this.config.save();
    } catch (error) {
      this.config.clearVerifier();
      throw error;
    }

    this.logger.vaultInitialized(this.config.storagePath);
    return { kind: 'LoggedOff' };
  }

  private async login(password: string, options: DeriveOptions): Promise<AccessState> {
    const credential = await this.credentials.authenticate(
      password,
      this.config.passwordSalt,
      this.requireVerifier(),
      options
    );
    if (!credential) {
      this.logger.loginFailed();
      return { kind: 'InvalidPassword' };
    }

    this.session = new Session(credential);
    this.logger.loginSucceeded();
    return LOGGED_ON;
  }

  private logoff(): AccessState {
    this.endSession('user');
    return { kind: 'LoggedOff' };
  }

  private endSession(reason: 'user' | 'shutdown' | 'reset'): void {
    this.session?.end();
    this.session = null;
    this.logger.loggedOff(reason);
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  private addRecord(title: string, body: string): AccessState {
    if (title === '' || body === '') {
      return { kind: 'AddRecord', error: 'missing-field' };
    }

    const token = this.requireSession().encrypt(body, title);
    try {
      this.store.put(title, token);
    } catch (error) {
      if (error instanceof DuplicateTitleError) {
        this.logger.recordDuplicate(title);
        return { kind: 'AddRecord', error: 'duplicate-title' };
      }
      if (error instanceof StorageIOError) {
        this.logger.error(error.message, 'Add note');
        return { kind: 'AddRecord', error: 'storage' };
      }
      throw error;
    }

    this.logger.recordAdded(title);
    return LOGGED_ON;
  }

  private findRecord(title: string): AccessState {
    if (title === '') {
      return { kind: 'FindRecord', error: 'missing-field' };
    }

    let token: string | undefined;
    try {
      token = this.store.get(title);
    } catch (error) {
      if (error instanceof StorageIOError) {
        this.logger.error(error.message, 'Find note');
        return { kind: 'RecordNotFound', title, error: 'storage' };
      }
      throw error;
    }

    if (token === undefined) {
      this.logger.recordNotFound(title);
      return { kind: 'RecordNotFound', title };
    }

    try {
      const body = this.requireSession().decrypt(token, title);
      this.logger.recordFound(title);
      return { kind: 'RecordFound', title, body };
    } catch (error) {
      if (error instanceof CipherError) {
        this.logger.recordUnreadable(title, error.message);
        return { kind: 'RecordNotFound', title, error: 'unreadable' };
      }
      throw error;
    }
  }

  private deleteRecord(title: string): AccessState {
    if (title === '') {
      return { kind: 'DeleteRecord', error: 'missing-field' };
    }

    try {
      this.store.delete(title);
    } catch (error) {
      if (error instanceof StorageIOError) {
        this.logger.error(error.message, 'Delete note');
        return { kind: 'DeleteRecord', error: 'storage' };
      }
      throw error;
    }

    this.logger.recordDeleted(title);
    return LOGGED_ON;
  }

  // ---------------------------------------------------------------------------
  // Password change
  // ---------------------------------------------------------------------------

  /**
   * Re-verify, derive the new credential under the same salt, re-encrypt every
   * note in one transaction, then persist the new verifier.
   *
   * When the verifier cannot be saved, the notes and the verifier on disk are
   * brought back into agreement before returning `storage`: the notes go back
   * under the old key, or if that fails the new verifier is saved again and the
   * new key stays live.
   */
  private async changePassword(
    current: string,
    next: string,
    options: DeriveOptions
  ): Promise<AccessState> {
    const salt = this.config.passwordSalt;
    const previousVerifier = Uint8Array.from(this.requireVerifier());

    const verified = await this.credentials.verify(current, salt, previousVerifier, options);
    if (!verified) {
      return this.passwordChangeFailed('invalid-password');
    }
    if (!this.credentials.meetsRequirements(next)) {
      return this.passwordChangeFailed('requirements');
    }

    const credential = await this.credentials.deriveCredential(next, salt, options);
    const nextVerifier = Uint8Array.from(credential.verifier);
    const nextSession = new Session(credential);
    const oldSession = this.requireSession();

    let rewritten: number;
    try {
      rewritten = this.store.rewriteAll(({ title, body }) =>
        nextSession.encrypt(oldSession.decrypt(body, title), title)
      );
    } catch (error) {
      nextSession.end();
      if (error instanceof CipherError) {
        this.logger.error(error.message, 'Re-encrypt notes');
        return this.passwordChangeFailed('unreadable');
      }
      if (error instanceof StorageIOError) {
        this.logger.error(error.message, 'Re-encrypt notes');
        return this.passwordChangeFailed('storage');
      }
      throw error;
    }

    this.config.setVerifier(nextVerifier);
    if (await this.trySaveConfig('Save new password')) {
      this.commitSession(oldSession, nextSession);
      this.logger.passwordChanged(rewritten);
      return LOGGED_ON;
    }

    // The verifier file is written atomically, so it holds one value or the other
    const onDisk = await this.readPersistedVerifier();
    if (onDisk !== null && constantTimeEqual(onDisk, nextVerifier)) {
      this.commitSession(oldSession, nextSession);
      this.logger.passwordChanged(rewritten);
      return LOGGED_ON;
    }

    if (this.tryRewriteNotes(nextSession, oldSession)) {
      this.config.setVerifier(previousVerifier);
      nextSession.end();
      if (onDisk === null || !constantTimeEqual(onDisk, previousVerifier)) {
        await this.trySaveConfig('Restore previous password');
      }
      return this.passwordChangeFailed('storage');
    }

    // Notes are still under the new key
    if (await this.trySaveConfig('Retry saving new password')) {
      this.commitSession(oldSession, nextSession);
      this.logger.passwordChanged(rewritten);
      return LOGGED_ON;
    }
    this.commitSession(oldSession, nextSession);
    this.logger.error('Notes are under the new password but it could not be saved', 'Change password');
    return this.passwordChangeFailed('storage');
  }

  private passwordChangeFailed(
    reason: 'invalid-password' | 'requirements' | 'unreadable' | 'storage'
  ): AccessState {
    this.logger.passwordChangeFailed(reason);
    return { kind: 'ChangePasswordFailed', reason };
  }

  private commitSession(oldSession: Session, nextSession: Session): void {
    oldSession.end();
    this.session = nextSession;
  }

  private async trySaveConfig(operation: string): Promise<boolean> {
    try {
      await this.config.save();
      return true;
    } catch (error) {
      if (!(error instanceof NoteVaultError)) throw error;
      this.logger.error(errorMessage(error), operation);
      return false;
    }
  }

  /** The verifier currently on disk, or null when it cannot be read. */
  private async readPersistedVerifier(): Promise<Uint8Array | null> {
    try {
      const onDisk = await VaultConfig.load(this.config.storagePath);
      return onDisk.verifier;
    } catch (error) {
      if (!(error instanceof NoteVaultError)) throw error;
      this.logger.error(errorMessage(error), 'Read saved password');
      return null;
    }
  }

  private tryRewriteNotes(from: Session, to: Session): boolean {
    try {
      this.store.rewriteAll(({ title, body }) => to.encrypt(from.decrypt(body, title), title));
      return true;
    } catch (error) {
      if (!(error instanceof NoteVaultError)) throw error;
      this.logger.error(errorMessage(error), 'Restore notes');
      return false;
    }
  }

  // ---------------------------------------------------------------------------
  // Hard reset
  // ---------------------------------------------------------------------------

  /**
   * Delete every note and the configuration. Notes go first so a failure to
   * erase the configuration leaves a usable, empty vault under the same
   * password.
   */
  private async hardReset(password: string, options: DeriveOptions): Promise<AccessState> {
    const verified = await this.credentials.verify(
      password,
      this.config.passwordSalt,
      this.requireVerifier(),
      options
    );
    if (!verified) {
      return { kind: 'ConfirmHardResetFailed', reason: 'invalid-password' };
    }

    try {
      this.store.clear();
    } catch (error) {
      if (error instanceof StorageIOError) {
        this.logger.error(error.message, 'Erase notes');
        return { kind: 'ConfirmHardResetFailed', reason: 'storage' };
      }
      throw error;
    }
    try {
      await this.config.erase(this.credentials.generateSalt());
    } catch (error) {
      if (error instanceof ConfigIOError) {
        this.logger.error(error.message, 'Erase configuration');
        return { kind: 'ConfirmHardResetFailed', reason: 'storage' };
      }
      throw error;
    }
    this.endSession('reset');

    this.logger.hardReset(this.config.storagePath);
    return { kind: 'HardReset' };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private requireSession(): Session {
    if (!this.session || !holdsSession(this.current)) {
      throw new Error(`No active session in state ${this.current.kind}`);
    }
    return this.session;
  }

  private requireVerifier(): Uint8Array {
    const verifier = this.config.verifier;
    if (!verifier) {
      throw new Error('No password has been set for this vault');
    }
    return verifier;
  }
}
