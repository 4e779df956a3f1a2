/**
 * Prompter that answers from a script and records everything shown.
 */

import { InputClosedError, type Prompter } from '../../src/cli/prompter.js';

export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly printed: string[] = [];
  readonly warnings: string[] = [];
  suspended = 0;

  private readonly answers: string[];

  constructor(answers: ReadonlyArray<string>) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new InputClosedError();
    }
    return answer;
  }

  print(...lines: string[]): void {
    this.printed.push(...lines);
  }

  warn(...lines: string[]): void {
    this.warnings.push(...lines);
  }

  async suspend<T>(task: () => Promise<T>): Promise<T> {
    this.suspended++;
    return task();
  }

  /** Answers not consumed by the dialogue */
  get remaining(): number {
    return this.answers.length;
  }
}
