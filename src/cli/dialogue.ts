/**
 * Validating question loops. Each helper re-asks until the answer parses.
 */

import type { Dimension } from '../lib/core/dimension.js';
import { isLatticeError } from '../lib/core/errors.js';
import { parseDimension } from '../lib/parser/dimension-parser.js';
import type { Prompter } from './prompter.js';

const INTEGER = /^[+-]?\d+$/;

export interface IntOptions {
  /** Returned for an empty answer */
  readonly defaultValue?: number;
  /** Smallest accepted value */
  readonly min?: number;
}

export async function askInt(p: Prompter, question: string, options: IntOptions = {}): Promise<number> {
  const { defaultValue, min } = options;
  const prompt = defaultValue === undefined ? `${question}: ` : `${question} [default: ${defaultValue}]: `;

  for (;;) {
    const answer = (await p.ask(prompt)).trim();
    if (answer === '' && defaultValue !== undefined) {
      return defaultValue;
    }
    if (!INTEGER.test(answer)) {
      p.warn('Invalid input. Please enter an integer.');
      continue;
    }
    const value = parseInt(answer, 10);
    if (!Number.isSafeInteger(value)) {
      p.warn('Invalid input. Number is out of range.');
      continue;
    }
    if (min !== undefined && value < min) {
      p.warn(`Invalid input. Please enter an integer >= ${min}.`);
      continue;
    }
    return value;
  }
}

export async function askFloat(p: Prompter, question: string): Promise<number> {
  for (;;) {
    const answer = (await p.ask(`${question}: `)).trim();
    const value = Number(answer);
    if (answer !== '' && Number.isFinite(value)) {
      return value;
    }
    p.warn('Invalid input. Please enter a number.');
  }
}

export async function askYesNo(p: Prompter, question: string): Promise<boolean> {
  for (;;) {
    const answer = (await p.ask(`${question} (y/n): `)).trim().toLowerCase();
    if (answer === 'y' || answer === 'yes') return true;
    if (answer === 'n' || answer === 'no') return false;
    p.warn("Invalid input. Please enter 'y' or 'n'.");
  }
}

/** `1 or 2`, `1, 2, or 3` */
function formatChoices(count: number): string {
  const numbers = Array.from({ length: count }, (_, n) => String(n + 1));
  if (numbers.length <= 2) return numbers.join(' or ');
  return `${numbers.slice(0, -1).join(', ')}, or ${numbers[numbers.length - 1]}`;
}

/**
 * Ask for a numbered choice. The operator types 1..n; the matching entry of
 * `choices` is returned.
 */
export async function askChoice<T>(p: Prompter, question: string, choices: ReadonlyArray<T>): Promise<T> {
  const numbers = choices.map((_, n) => n + 1).join('/');
  for (;;) {
    const answer = (await p.ask(`${question} (${numbers}): `)).trim();
    const n = INTEGER.test(answer) ? parseInt(answer, 10) : NaN;
    if (n >= 1 && n <= choices.length) {
      return choices[n - 1];
    }
    p.warn(`Invalid choice. Please enter ${formatChoices(choices.length)}.`);
  }
}

/**
 * Ask for one lattice axis: a single index (`5`) or a range (`0:9`).
 */
export async function askDimension(p: Prompter, question: string): Promise<Dimension> {
  for (;;) {
    const answer = await p.ask(`${question}: `);
    try {
      return parseDimension(answer);
    } catch (error) {
      if (!isLatticeError(error)) throw error;
      p.warn(...error.message.split('\n').map(line => `  ${line.trim()}`));
    }
  }
}
