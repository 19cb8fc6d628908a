/**
 * Tests for the terminal session loop with a scripted terminal.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import { runSession } from '../cli';
import { MENU } from '../render';
import type { Terminal } from '../prompts';
import { openVault } from '../../access/open-vault';
import type { AccessStateMachine } from '../../access/access-machine';
import { CredentialManager, PASSWORD_REQUIREMENTS } from '../../vault/credentials';

const FAST_TEST_PARAMS = { N: 16, r: 8, p: 1, dkLen: 32 };

class ScriptedTerminal implements Terminal {
  readonly printed: string[] = [];
  readonly hiddenQuestions: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(_question: string): Promise<string | null> {
    return this.answers.shift() ?? null;
  }

  async askHidden(question: string): Promise<string | null> {
    this.hiddenQuestions.push(question);
    return this.answers.shift() ?? null;
  }

  print(text: string): void {
    this.printed.push(text);
  }
}

describe('runSession', () => {
  let testDir: string;
  let machine: AccessStateMachine;

  beforeEach(async () => {
    testDir = mkdtempSync(path.join(os.tmpdir(), 'notevault-cli-'));
    machine = await openVault({ storageDir: testDir, credentials: new CredentialManager(FAST_TEST_PARAMS) });
  });

  afterEach(() => {
    machine.shutdown();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should walk through setup, add and find', async () => {
    const terminal = new ScriptedTerminal([
      'Str0ng!Pass', // new password
      'Str0ng!Pass', // login
      'a',
      'groceries',
      'eggs',
      'f',
      'groceries',
      '', // acknowledge
      'q',
    ]);

    await runSession(machine, terminal);

    expect(terminal.printed).toEqual([
      `Set new password to begin.\n${PASSWORD_REQUIREMENTS}`,
      'Welcome to NoteVault!',
      MENU,
      'Enter note title and body:',
      MENU,
      'Find note:',
      '  groceries',
      'groceries\n---------\neggs',
      MENU,
    ]);
    expect(terminal.hiddenQuestions).toEqual(['New password: ', 'Password: ']);
    expect(machine.state).toEqual({ kind: 'LoggedOn' });
  });

  it('should go back from a screen on an empty title', async () => {
    const terminal = new ScriptedTerminal(['Str0ng!Pass', 'Str0ng!Pass', 'd', '', 'q']);

    await runSession(machine, terminal);

    expect(terminal.printed.slice(3)).toEqual(['Delete note:', '  (no notes)', MENU]);
    expect(machine.state).toEqual({ kind: 'LoggedOn' });
  });

  it('should report unknown menu options', async () => {
    const terminal = new ScriptedTerminal(['Str0ng!Pass', 'Str0ng!Pass', 'x', 'q']);

    await runSession(machine, terminal);

    expect(terminal.printed).toContain('Unknown option: x');
  });

  it('should stop when input ends', async () => {
    const terminal = new ScriptedTerminal(['Str0ng!Pass']);

    await runSession(machine, terminal);

    expect(machine.state).toEqual({ kind: 'LoggedOff' });
    expect(terminal.printed).toEqual([`Set new password to begin.\n${PASSWORD_REQUIREMENTS}`, 'Welcome to NoteVault!']);
  });
});
