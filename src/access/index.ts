export { AccessStateMachine, type AccessStateMachineOptions } from './access-machine';
export { openVault, type OpenVaultOptions } from './open-vault';
export { Session } from './session';
export type { Intent, IntentType } from './intents';
export {
  type AccessState,
  type AuthenticatedState,
  type StateKind,
  type AddRecordError,
  type LookupError,
  type RecordReadError,
  type ChangePasswordFailure,
  type HardResetFailure,
  isAuthenticated,
  holdsSession,
} from './states';
