import { describe, it, expect } from 'vitest';
import { Session } from '../session';
import { isAuthenticated, holdsSession, type AccessState } from '../states';
import { Credential } from '../../vault/credentials';
import { CipherError } from '../../errors';

function createCredential(): Credential {
  return new Credential(new Uint8Array(32).fill(1), new Uint8Array(32).fill(2));
}

describe('Session', () => {
  it('should round-trip a body bound to its title', () => {
    const session = new Session(createCredential());
    const token = session.encrypt('eggs, milk', 'groceries');

    expect(session.decrypt(token, 'groceries')).toBe('eggs, milk');
  });

  it('should refuse a body under another title', () => {
    const session = new Session(createCredential());
    const token = session.encrypt('eggs, milk', 'groceries');

    expect(() => session.decrypt(token, 'chores')).toThrow(CipherError);
  });

  it('should wipe the credential it was built from', () => {
    const credential = createCredential();
    const session = new Session(credential);

    expect(credential.isWiped).toBe(true);
    expect(credential.encryptionKey.every((b) => b === 0)).toBe(true);
    expect(session.isActive).toBe(true);
  });

  it('should still decrypt after the credential is wiped', () => {
    const first = new Session(createCredential());
    const token = first.encrypt('body', 'title');

    const second = new Session(createCredential());
    expect(second.decrypt(token, 'title')).toBe('body');
  });

  it('should refuse use after end', () => {
    const session = new Session(createCredential());
    session.end();

    expect(session.isActive).toBe(false);
    expect(() => session.encrypt('b', 't')).toThrow('Session has ended');
    expect(() => session.end()).not.toThrow();
  });
});

describe('state predicates', () => {
  const states: AccessState[] = [
    { kind: 'Empty' },
    { kind: 'InvalidNewPassword' },
    { kind: 'LoggedOff' },
    { kind: 'InvalidPassword' },
    { kind: 'LoggedOn' },
    { kind: 'AddRecord' },
    { kind: 'FindRecord' },
    { kind: 'DeleteRecord' },
    { kind: 'RecordFound', title: 't', body: 'b' },
    { kind: 'RecordNotFound', title: 't' },
    { kind: 'ChangePassword' },
    { kind: 'ChangePasswordFailed', reason: 'requirements' },
    { kind: 'ConfirmHardReset' },
    { kind: 'ConfirmHardResetFailed', reason: 'declined' },
    { kind: 'HardReset' },
  ];

  it('should mark the record states as authenticated', () => {
    expect(states.filter(isAuthenticated).map((s) => s.kind)).toEqual([
      'LoggedOn',
      'AddRecord',
      'FindRecord',
      'DeleteRecord',
      'RecordFound',
      'RecordNotFound',
    ]);
  });

  it('should keep the session through password change and reset confirmation', () => {
    expect(states.filter(holdsSession).map((s) => s.kind)).toEqual([
      'LoggedOn',
      'AddRecord',
      'FindRecord',
      'DeleteRecord',
      'RecordFound',
      'RecordNotFound',
      'ChangePassword',
      'ChangePasswordFailed',
      'ConfirmHardReset',
      'ConfirmHardResetFailed',
    ]);
  });
});
