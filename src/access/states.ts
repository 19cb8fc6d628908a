/**
 * Access states of the vault front end.
 *
 * `kind` is the only thing the front end needs to render a screen; a few
 * states carry the detail the screen shows.
 */

export type AddRecordError = 'missing-field' | 'duplicate-title' | 'storage';
export type LookupError = 'missing-field' | 'storage';
export type RecordReadError = 'unreadable' | 'storage';
export type ChangePasswordFailure = 'invalid-password' | 'requirements' | 'unreadable' | 'storage';
export type HardResetFailure = 'invalid-password' | 'declined' | 'storage';

export type AccessState =
  | { kind: 'Empty' }
  | { kind: 'InvalidNewPassword' }
  | { kind: 'LoggedOff' }
  | { kind: 'InvalidPassword' }
  | { kind: 'LoggedOn' }
  | { kind: 'AddRecord'; error?: AddRecordError }
  | { kind: 'FindRecord'; error?: 'missing-field' }
  | { kind: 'DeleteRecord'; error?: LookupError }
  | { kind: 'RecordFound'; title: string; body: string }
  | { kind: 'RecordNotFound'; title: string; error?: RecordReadError }
  | { kind: 'ChangePassword' }
  | { kind: 'ChangePasswordFailed'; reason: ChangePasswordFailure }
  | { kind: 'ConfirmHardReset' }
  | { kind: 'ConfirmHardResetFailed'; reason: HardResetFailure }
  | { kind: 'HardReset' };

export type StateKind = AccessState['kind'];

export type AuthenticatedState = Extract<
  AccessState,
  { kind: 'LoggedOn' | 'AddRecord' | 'FindRecord' | 'DeleteRecord' | 'RecordFound' | 'RecordNotFound' }
>;

const AUTHENTICATED_KINDS: ReadonlySet<StateKind> = new Set<StateKind>([
  'LoggedOn',
  'AddRecord',
  'FindRecord',
  'DeleteRecord',
  'RecordFound',
  'RecordNotFound',
]);

const SESSION_KINDS: ReadonlySet<StateKind> = new Set<StateKind>([
  ...AUTHENTICATED_KINDS,
  'ChangePassword',
  'ChangePasswordFailed',
  'ConfirmHardReset',
  'ConfirmHardResetFailed',
]);

/**
 * States in which the record menu is available.
 */
export function isAuthenticated(state: AccessState): state is AuthenticatedState {
  return AUTHENTICATED_KINDS.has(state.kind);
}

/**
 * States in which a session (and its key) is alive. Password change and
 * reset confirmation keep it so the user can return to `LoggedOn`.
 */
export function holdsSession(state: AccessState): boolean {
  return SESSION_KINDS.has(state.kind);
}
