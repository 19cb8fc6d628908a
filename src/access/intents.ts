/**
 * User intents dispatched to the access state machine.
 */

export type Intent =
  | { type: 'submitPassword'; password: string }
  | { type: 'acknowledge' }
  | { type: 'selectAdd' }
  | { type: 'selectFind' }
  | { type: 'selectDelete' }
  | { type: 'submitRecord'; title: string; body: string }
  | { type: 'submitFind'; title: string }
  | { type: 'submitDelete'; title: string }
  | { type: 'cancel' }
  | { type: 'requestPasswordChange' }
  | { type: 'submitPasswordChange'; current: string; next: string }
  | { type: 'requestReset' }
  | { type: 'confirmReset'; password: string }
  | { type: 'logoff' };

export type IntentType = Intent['type'];
