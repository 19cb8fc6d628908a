/**
 * Text for each access state, and parsing of the options menu.
 */

import type { AccessState, ChangePasswordFailure, HardResetFailure } from '../access/states';
import type { Intent } from '../access/intents';
import { APP_NAME } from '../config/options';
import { PASSWORD_REQUIREMENTS } from '../vault/credentials';

export const MENU = 'Options: [a]dd note  [f]ind note  [d]elete note  [p] change password  [r]eset  [l]og off  [q]uit';

export type MenuChoice = Intent | { type: 'quit' };

const MENU_CHOICES: Record<string, MenuChoice> = {
  a: { type: 'selectAdd' },
  add: { type: 'selectAdd' },
  f: { type: 'selectFind' },
  find: { type: 'selectFind' },
  d: { type: 'selectDelete' },
  delete: { type: 'selectDelete' },
  p: { type: 'requestPasswordChange' },
  password: { type: 'requestPasswordChange' },
  r: { type: 'requestReset' },
  reset: { type: 'requestReset' },
  l: { type: 'logoff' },
  logoff: { type: 'logoff' },
  q: { type: 'quit' },
  quit: { type: 'quit' },
};

/**
 * Map a menu line to an intent. Case and surrounding spaces are ignored.
 *
 * @returns null for anything that is not a menu option
 */
export function parseMenuChoice(input: string): MenuChoice | null {
  const key = input.trim().toLowerCase();
  return Object.hasOwn(MENU_CHOICES, key) ? MENU_CHOICES[key] : null;
}

export function renderState(state: AccessState): string {
  switch (state.kind) {
    case 'Empty':
      return `Set new password to begin.\n${PASSWORD_REQUIREMENTS}`;
    case 'InvalidNewPassword':
      return `Error: provided password did not satisfy requirements!\n${PASSWORD_REQUIREMENTS}`;
    case 'LoggedOff':
      return `Welcome to ${APP_NAME}!`;
    case 'InvalidPassword':
      return 'Error: wrong password! The app remains locked.';
    case 'LoggedOn':
      return MENU;
    case 'AddRecord':
      switch (state.error) {
        case 'missing-field':
          return 'Error: title and body are both required.';
        case 'duplicate-title':
          return 'Error: a note with this title already exists. Pick another title.';
        case 'storage':
          return 'Error: the note could not be saved.';
        default:
          return 'Enter note title and body:';
      }
    case 'FindRecord':
      return state.error ? 'Error: a title is required.' : 'Find note:';
    case 'DeleteRecord':
      if (state.error === 'missing-field') return 'Error: a title is required.';
      if (state.error === 'storage') return 'Error: the note could not be deleted.';
      return 'Delete note:';
    case 'RecordFound':
      return `${state.title}\n${'-'.repeat(Math.min(state.title.length, 60))}\n${state.body}`;
    case 'RecordNotFound':
      if (state.error === 'unreadable') {
        return `Error: note "${state.title}" could not be decrypted.`;
      }
      if (state.error === 'storage') {
        return `Error: note "${state.title}" could not be read.`;
      }
      return `No note titled "${state.title}".`;
    case 'ChangePassword':
      return `Change password.\n${PASSWORD_REQUIREMENTS}`;
    case 'ChangePasswordFailed':
      return `${describePasswordChangeFailure(state.reason)} Password not changed.`;
    case 'ConfirmHardReset':
      return 'Delete all data? Every note and the password will be erased.';
    case 'ConfirmHardResetFailed':
      return describeResetFailure(state.reason);
    case 'HardReset':
      return 'All data deleted.';
  }
}

function describePasswordChangeFailure(reason: ChangePasswordFailure): string {
  switch (reason) {
    case 'invalid-password':
      return 'Error: current password is wrong.';
    case 'requirements':
      return 'Error: new password did not satisfy requirements.';
    case 'unreadable':
      return 'Error: a note could not be decrypted.';
    case 'storage':
      return 'Error: the new password could not be saved.';
  }
}

function describeResetFailure(reason: HardResetFailure): string {
  switch (reason) {
    case 'invalid-password':
      return 'Error: wrong password. Nothing was deleted.';
    case 'declined':
      return 'Reset cancelled. Nothing was deleted.';
    case 'storage':
      return 'Error: the vault could not be fully reset. The password is unchanged.';
  }
}

/**
 * Titles as a short indented list for the find and delete screens.
 */
export function renderTitles(titles: string[]): string {
  if (titles.length === 0) {
    return '  (no notes)';
  }
  return titles.map((title) => `  ${title}`).join('\n');
}
