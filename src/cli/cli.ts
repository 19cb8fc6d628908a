#!/usr/bin/env node
/**
 * NoteVault terminal front end.
 *
 * Usage:
 *   npx tsx src/cli/cli.ts [options]
 *
 * Example:
 *   # Use the default vault in ~/.config/NoteVault
 *   npx tsx src/cli/cli.ts
 *
 *   # Keep the vault somewhere else and log state changes
 *   npx tsx src/cli/cli.ts --storage-dir /mnt/usb/notes -v
 *
 * Exits 0 on quit (including Ctrl+C and end of input), 1 when the vault
 * cannot be opened.
 */

import { pathToFileURL } from 'url';
import { type AccessStateMachine, type Intent, openVault } from '../access';
import { type VaultOptions, USAGE, UsageError, resolveOptions } from '../config/options';
import { errorMessage, isFatal } from '../errors';
import { VaultLogger, levelForVerbosity } from '../logging/vault-logger';
import { type Terminal, Prompter } from './prompts';
import { parseMenuChoice, renderState, renderTitles } from './render';

/**
 * Render the current state, read what it needs, dispatch. Returns when the
 * user quits or input ends.
 */
export async function runSession(machine: AccessStateMachine, terminal: Terminal): Promise<void> {
  for (;;) {
    terminal.print(renderState(machine.state));
    const intent = await readIntent(machine, terminal);
    if (!intent) return;
    await machine.dispatch(intent);
  }
}

/**
 * @returns The next intent, or null to quit
 */
export async function readIntent(machine: AccessStateMachine, terminal: Terminal): Promise<Intent | null> {
  const state = machine.state;

  switch (state.kind) {
    case 'Empty': {
      const password = await terminal.askHidden('New password: ');
      return password === null ? null : { type: 'submitPassword', password };
    }

    case 'LoggedOff': {
      const password = await terminal.askHidden('Password: ');
      return password === null ? null : { type: 'submitPassword', password };
    }

    case 'LoggedOn':
      return readMenuChoice(terminal);

    case 'AddRecord': {
      const title = await terminal.ask('Title (empty to go back): ');
      if (title === null) return null;
      if (title === '') return { type: 'cancel' };
      const body = await terminal.ask('Body: ');
      return body === null ? null : { type: 'submitRecord', title, body };
    }

    case 'FindRecord':
    case 'DeleteRecord': {
      terminal.print(renderTitles(machine.listTitles()));
      const title = await terminal.ask('Title (empty to go back): ');
      if (title === null) return null;
      if (title === '') return { type: 'cancel' };
      return state.kind === 'FindRecord' ? { type: 'submitFind', title } : { type: 'submitDelete', title };
    }

    case 'ChangePassword': {
      const current = await terminal.askHidden('Current password (empty to go back): ');
      if (current === null) return null;
      if (current === '') return { type: 'cancel' };
      const next = await terminal.askHidden('New password: ');
      return next === null ? null : { type: 'submitPasswordChange', current, next };
    }

    case 'ConfirmHardReset': {
      const password = await terminal.askHidden('Password to confirm (empty to cancel): ');
      if (password === null) return null;
      return password === '' ? { type: 'cancel' } : { type: 'confirmReset', password };
    }

    default: {
      const line = await terminal.ask('Press Enter to continue...');
      return line === null ? null : { type: 'acknowledge' };
    }
  }
}

async function readMenuChoice(terminal: Terminal): Promise<Intent | null> {
  for (;;) {
    const line = await terminal.ask('> ');
    if (line === null) return null;

    const choice = parseMenuChoice(line);
    if (!choice) {
      terminal.print(`Unknown option: ${line}`);
      continue;
    }
    return choice.type === 'quit' ? null : choice;
  }
}

export async function main(argv: string[]): Promise<number> {
  let options: VaultOptions;
  try {
    options = resolveOptions(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = new VaultLogger({
    logFile: options.logFile,
    level: levelForVerbosity(options.verbosity),
  });

  let machine: AccessStateMachine;
  try {
    machine = await openVault({
      storageDir: options.storageDir,
      createIfMissing: !options.explicitStorageDir,
      logger,
    });
  } catch (error) {
    logger.error(errorMessage(error), 'Startup');
    return 1;
  }

  const prompter = new Prompter();
  try {
    await runSession(machine, prompter);
    return 0;
  } catch (error) {
    logger.error(
      errorMessage(error),
      isFatal(error) ? 'Fatal' : 'Unexpected error',
      error instanceof Error ? error.stack : undefined
    );
    return 1;
  } finally {
    machine.shutdown();
    prompter.close();
  }
}

const entryPoint = process.argv[1];
if (entryPoint !== undefined && import.meta.url === pathToFileURL(entryPoint).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  );
}
