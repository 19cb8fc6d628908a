/**
 * Runtime options from the command line and environment.
 *
 * Command line:
 *   -d, --storage-dir <path>   Existing directory holding the vault
 *   -v, --verbose              Repeat for more detail (-v verbose, -vv debug)
 *   --log-file <path>          Also append JSONL log entries to this file
 *   -h, --help
 *
 * Environment variables:
 *   NOTEVAULT_DIR       - Storage directory (same rules as --storage-dir)
 *   NOTEVAULT_LOG_FILE  - JSONL log file
 *   NOTEVAULT_VERBOSE   - Verbosity count, e.g. "1" or "2"
 *
 * Command line values take precedence.
 */

import { homedir } from 'os';
import { join, resolve } from 'path';

export const APP_NAME = 'NoteVault';

export interface VaultOptions {
  /** Absolute storage directory */
  storageDir: string;
  /** True when the directory was named explicitly and must already exist */
  explicitStorageDir: boolean;
  /** 0 = info, 1 = verbose, 2+ = debug */
  verbosity: number;
  logFile?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `
${APP_NAME} - a minimalistic secure notes storage app

Usage:
  notevault [options]

Options:
  -d, --storage-dir <path>  Alternative directory for application data (must exist)
  -v, --verbose             Print state information; use -vv for debug detail
  --log-file <path>         Append structured JSONL logs to this file
  -h, --help                Show this help

Environment:
  NOTEVAULT_DIR, NOTEVAULT_LOG_FILE, NOTEVAULT_VERBOSE
`;

export function defaultStorageDir(home: string = homedir()): string {
  return join(home, '.config', APP_NAME);
}

/**
 * @throws UsageError on unknown flags or missing flag values
 */
export function resolveOptions(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): VaultOptions {
  let storageDir: string | undefined;
  let logFile: string | undefined;
  let verbosity: number | undefined;
  let help = false;

  const takeValue = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      help = true;
    } else if (arg === '-d' || arg === '--storage-dir') {
      storageDir = takeValue(arg, i);
      i++;
    } else if (arg.startsWith('--storage-dir=')) {
      storageDir = arg.slice('--storage-dir='.length);
    } else if (arg === '--log-file') {
      logFile = takeValue(arg, i);
      i++;
    } else if (arg.startsWith('--log-file=')) {
      logFile = arg.slice('--log-file='.length);
    } else if (arg === '--verbose') {
      verbosity = (verbosity ?? 0) + 1;
    } else if (/^-v+$/.test(arg)) {
      verbosity = (verbosity ?? 0) + arg.length - 1;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  const envDir = env.NOTEVAULT_DIR || undefined;
  const chosenDir = storageDir ?? envDir;

  return {
    storageDir: chosenDir ? resolve(chosenDir) : defaultStorageDir(home),
    explicitStorageDir: chosenDir !== undefined,
    verbosity: verbosity ?? parseVerbosity(env.NOTEVAULT_VERBOSE),
    logFile: logFile ?? (env.NOTEVAULT_LOG_FILE || undefined),
    help,
  };
}

function parseVerbosity(value: string | undefined): number {
  const parsed = parseInt(value || '0', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}
