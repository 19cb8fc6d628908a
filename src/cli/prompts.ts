/**
 * Line input for the terminal front end.
 *
 * One readline interface serves the whole session. Passwords are read with
 * echo turned off when the input is a terminal.
 */

import * as readline from 'readline';
import { Writable } from 'stream';

/**
 * What the session loop needs from a terminal. Tests script it.
 */
export interface Terminal {
  ask(question: string): Promise<string | null>;
  askHidden(question: string): Promise<string | null>;
  print(text: string): void;
}

/**
 * Output stream that forwards to the real output unless muted.
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export class Prompter implements Terminal {
  private readonly rl: readline.Interface;
  private readonly output: MutableOutput;
  private readonly hideInput: boolean;
  private closed = false;
  private pending: ((answer: string | null) => void) | null = null;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly out: NodeJS.WritableStream = process.stdout
  ) {
    this.output = new MutableOutput(out);
    this.hideInput = 'isTTY' in input && input.isTTY === true;
    this.rl = readline.createInterface({
      input,
      output: this.output,
      terminal: this.hideInput,
    });

    // Ctrl+C and end of input both end the session
    this.rl.on('SIGINT', () => this.rl.close());
    this.rl.on('close', () => {
      this.closed = true;
      this.settle(null);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @returns The line without its newline, or null once input has ended
   */
  ask(question: string): Promise<string | null> {
    return this.question(question, false);
  }

  /**
   * Like {@link Prompter.ask}, without echoing what is typed.
   */
  askHidden(question: string): Promise<string | null> {
    return this.question(question, this.hideInput);
  }

  print(text: string): void {
    this.out.write(text + '\n');
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private question(question: string, hidden: boolean): Promise<string | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      this.pending = resolve;
      this.rl.question(question, (answer) => {
        if (hidden) {
          this.output.muted = false;
          this.out.write('\n');
        }
        this.settle(answer);
      });
      if (hidden) {
        this.output.muted = true;
      }
    });
  }

  private settle(answer: string | null): void {
    const resolve = this.pending;
    this.pending = null;
    this.output.muted = false;
    resolve?.(answer);
  }
}
