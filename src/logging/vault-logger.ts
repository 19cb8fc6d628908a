/**
 * Vault Logger - Structured logging for vault activity.
 *
 * Every entry can be appended to a JSONL file for later inspection; entries at
 * or above the configured level are also printed to stderr as
 *
 *   2026-01-02 03:04:05 | INFO     | Logged on
 *
 * Passwords, keys, verifiers and note bodies never appear in events. Titles do.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  verbose: 15,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Log event types for vault activity.
 */
export type VaultLogEvent =
  | { type: 'vault_opened'; storageDir: string; initialized: boolean }
  | { type: 'vault_initialized'; storageDir: string }
  | { type: 'login_succeeded' }
  | { type: 'login_failed' }
  | { type: 'logged_off'; reason: 'user' | 'shutdown' | 'reset' }
  | { type: 'state_changed'; from: string; to: string; intent: string }
  | { type: 'record_added'; title: string }
  | { type: 'record_duplicate'; title: string }
  | { type: 'record_found'; title: string }
  | { type: 'record_not_found'; title: string }
  | { type: 'record_unreadable'; title: string; error: string }
  | { type: 'record_deleted'; title: string }
  | { type: 'password_changed'; records: number }
  | { type: 'password_change_failed'; reason: string }
  | { type: 'hard_reset'; storageDir: string }
  | { type: 'error'; error: string; context?: string; stack?: string }
  | { type: 'debug'; message: string; data?: unknown };

/**
 * Full log entry with metadata.
 */
export interface VaultLogEntry {
  timestamp: string;
  level: LogLevel;
  event: VaultLogEvent;
}

export interface VaultLoggerOptions {
  /** JSONL file to append every entry to */
  logFile?: string;
  /** Minimum level printed to stderr (default: info) */
  level?: LogLevel;
  /** Where console lines go (default: process.stderr) */
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * Maps the -v count to a console threshold: 0 = info, 1 = verbose, 2+ = debug.
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return 'debug';
  if (verbosity === 1) return 'verbose';
  return 'info';
}

export class VaultLogger {
  private logFile?: string;
  private threshold: LogLevel;
  private write: (line: string) => void;
  private now: () => Date;
  private enabled = true;

  constructor(options: VaultLoggerOptions = {}) {
    this.logFile = options.logFile;
    this.threshold = options.level ?? 'info';
    this.write = options.write ?? ((line) => process.stderr.write(line + '\n'));
    this.now = options.now ?? (() => new Date());

    if (this.logFile) {
      const dir = dirname(this.logFile);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * Logs an event at the given level.
   */
  log(level: LogLevel, event: VaultLogEvent): void {
    if (!this.enabled) return;

    const date = this.now();
    const entry: VaultLogEntry = {
      timestamp: date.toISOString(),
      level,
      event,
    };

    if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold]) {
      this.write(formatLine(date, level, event));
    }

    if (this.logFile) {
      try {
        appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
      } catch (error) {
        this.write(`[VaultLogger] Failed to write log: ${error}`);
      }
    }
  }

  /**
   * Convenience methods for common log types.
   */
  vaultOpened(storageDir: string, initialized: boolean): void {
    this.log('info', { type: 'vault_opened', storageDir, initialized });
  }

  vaultInitialized(storageDir: string): void {
    this.log('info', { type: 'vault_initialized', storageDir });
  }

  loginSucceeded(): void {
    this.log('info', { type: 'login_succeeded' });
  }

  loginFailed(): void {
    this.log('warn', { type: 'login_failed' });
  }

  loggedOff(reason: 'user' | 'shutdown' | 'reset'): void {
    this.log('info', { type: 'logged_off', reason });
  }

  stateChanged(from: string, to: string, intent: string): void {
    this.log('verbose', { type: 'state_changed', from, to, intent });
  }

  recordAdded(title: string): void {
    this.log('info', { type: 'record_added', title });
  }

  recordDuplicate(title: string): void {
    this.log('info', { type: 'record_duplicate', title });
  }

  recordFound(title: string): void {
    this.log('info', { type: 'record_found', title });
  }

  recordNotFound(title: string): void {
    this.log('info', { type: 'record_not_found', title });
  }

  // Unreadable bodies point at tampering or a key mix-up
  recordUnreadable(title: string, error: string): void {
    this.log('warn', { type: 'record_unreadable', title, error });
  }

  recordDeleted(title: string): void {
    this.log('info', { type: 'record_deleted', title });
  }

  passwordChanged(records: number): void {
    this.log('info', { type: 'password_changed', records });
  }

  passwordChangeFailed(reason: string): void {
    this.log('warn', { type: 'password_change_failed', reason });
  }

  hardReset(storageDir: string): void {
    this.log('info', { type: 'hard_reset', storageDir });
  }

  error(error: string, context?: string, stack?: string): void {
    this.log('error', { type: 'error', error, context, stack });
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', { type: 'debug', message, data });
  }

  /**
   * Gets the path to the log file, if one was configured.
   */
  getLogPath(): string | undefined {
    return this.logFile;
  }

  /**
   * Disables logging (for tests).
   */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }
}

/**
 * A logger that drops everything. Used where no logger is supplied.
 */
export function createSilentLogger(): VaultLogger {
  const logger = new VaultLogger({ write: () => {} });
  logger.disable();
  return logger;
}

/**
 * Human-readable message for an event.
 */
export function describeEvent(event: VaultLogEvent): string {
  switch (event.type) {
    case 'vault_opened':
      return `Opened vault in ${event.storageDir} (${event.initialized ? 'password set' : 'no password set'})`;
    case 'vault_initialized':
      return `Master password set for ${event.storageDir}`;
    case 'login_succeeded':
      return 'Logged on';
    case 'login_failed':
      return 'Login failed: invalid password';
    case 'logged_off':
      return `Logged off (${event.reason})`;
    case 'state_changed':
      return `State ${event.from} -> ${event.to} (${event.intent})`;
    case 'record_added':
      return `Added note "${event.title}"`;
    case 'record_duplicate':
      return `Note "${event.title}" already exists`;
    case 'record_found':
      return `Found note "${event.title}"`;
    case 'record_not_found':
      return `No note titled "${event.title}"`;
    case 'record_unreadable':
      return `Note "${event.title}" could not be decrypted: ${event.error}`;
    case 'record_deleted':
      return `Deleted note "${event.title}"`;
    case 'password_changed':
      return `Password changed, ${event.records} note(s) re-encrypted`;
    case 'password_change_failed':
      return `Password change failed: ${event.reason}`;
    case 'hard_reset':
      return `Vault in ${event.storageDir} erased`;
    case 'error':
      return event.context ? `${event.context}: ${event.error}` : event.error;
    case 'debug':
      return event.message;
  }
}

/**
 * Console line: `YYYY-MM-DD HH:MM:SS | LEVEL    | message`, local time.
 */
export function formatLine(date: Date, level: LogLevel, event: VaultLogEvent): string {
  return `${formatTimestamp(date)} | ${level.toUpperCase().padEnd(8)} | ${describeEvent(event)}`;
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Reads all log entries from a JSONL log file. Lines that do not parse are skipped.
 */
export function readVaultLogs(logFile: string): VaultLogEntry[] {
  if (!existsSync(logFile)) {
    return [];
  }

  const content = readFileSync(logFile, 'utf-8');
  const lines = content.trim().split('\n').filter(line => line.length > 0);

  return lines.map(line => {
    try {
      return JSON.parse(line) as VaultLogEntry;
    } catch {
      return null;
    }
  }).filter((entry): entry is VaultLogEntry => entry !== null);
}

/**
 * Filters log entries by type.
 */
export function filterLogsByType(logs: VaultLogEntry[], types: VaultLogEvent['type'][]): VaultLogEntry[] {
  return logs.filter(entry => types.includes(entry.event.type));
}
