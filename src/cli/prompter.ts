/**
 * Line-oriented terminal I/O for the wizard dialogue.
 */

import * as readline from 'node:readline';

/**
 * Input/output used by the dialogue. Tests drive the dialogue with a
 * scripted implementation.
 */
export interface Prompter {
  /** Show `question` and wait for one line of input (without the newline) */
  ask(question: string): Promise<string>;
  print(...lines: string[]): void;
  warn(...lines: string[]): void;
  /**
   * Release the terminal while `task` runs (the visual selector takes over
   * raw keyboard input), then resume line input.
   */
  suspend<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Raised when input ends (Ctrl+C, Ctrl+D or a closed pipe) while a question
 * is pending.
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

/**
 * Prompter over stdin/stdout. Output goes through console so it interleaves
 * with other logging.
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | null = null;
  // Lines that arrive before anyone asks (piped input, typing ahead)
  private readonly lines: string[] = [];
  private waiting: { resolve: (line: string) => void; reject: (error: Error) => void } | null = null;
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private open(): readline.Interface {
    if (!this.rl) {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      rl.on('line', line => this.receive(line));
      rl.on('close', () => this.end());
      // Without a listener readline only pauses on Ctrl+C
      rl.on('SIGINT', () => rl.close());
      this.rl = rl;
    }
    return this.rl;
  }

  private receive(line: string): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private end(): void {
    this.rl = null;
    this.ended = true;
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.reject(new InputClosedError());
  }

  async ask(question: string): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      this.output.write(question);
      return queued;
    }
    if (this.ended) {
      throw new InputClosedError();
    }
    const rl = this.open();
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
      rl.setPrompt(question);
      rl.prompt();
    });
  }

  print(...lines: string[]): void {
    for (const line of lines) console.log(line);
  }

  warn(...lines: string[]): void {
    for (const line of lines) console.warn(line);
  }

  async suspend<T>(task: () => Promise<T>): Promise<T> {
    this.close();
    return task();
  }

  close(): void {
    if (this.rl) {
      const rl = this.rl;
      this.rl = null;
      rl.removeAllListeners('close');
      rl.close();
    }
  }
}
