/**
 * Full-screen keyboard driver for the grid selector.
 *
 * Owns the terminal while it runs: raw keyboard input, alternate screen,
 * hidden cursor. All selection logic lives in the selector state machine;
 * this module only feeds it key presses and paints the rendered lines.
 */

import * as readline from 'node:readline';
import { isLatticeFailure } from '../lib/core/errors.js';
import type { LatticeSpec } from '../lib/core/lattice-spec.js';
import { renderSelector } from '../lib/renderer/text-grid.js';
import {
  applySelectorAction,
  createSelector,
  type SelectorOptions,
  type SelectorState,
} from '../lib/selector/selector.js';
import { keyToAction } from './keymap.js';

const ENTER_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_SCREEN = '\x1b[?25h\x1b[?1049l';
const CLEAR = '\x1b[H\x1b[2J';

export interface TerminalStreams {
  readonly input: NodeJS.ReadStream;
  readonly output: NodeJS.WriteStream;
}

/**
 * Run an interactive selection session.
 *
 * @returns The finalized spec, or undefined if the operator cancelled
 * @throws Error when input is not an interactive terminal
 */
export function runTerminalSelector(
  options: SelectorOptions,
  streams: TerminalStreams = { input: process.stdin, output: process.stdout }
): Promise<LatticeSpec | undefined> {
  const { input, output } = streams;
  if (!input.isTTY) {
    return Promise.reject(new Error('Visual selector needs an interactive terminal'));
  }

  return new Promise(resolve => {
    let state: SelectorState = createSelector(options);

    const draw = (): void => {
      const screen = renderSelector(state, { rows: output.rows, cols: output.columns });
      if (isLatticeFailure(screen)) {
        output.write(CLEAR + (screen.details ?? screen.reason));
        return;
      }
      output.write(CLEAR + screen.lines.join('\n'));
    };

    const finish = (spec: LatticeSpec | undefined): void => {
      input.off('keypress', onKeypress);
      output.off('resize', draw);
      input.setRawMode(false);
      input.pause();
      output.write(LEAVE_SCREEN);
      resolve(spec);
    };

    const onKeypress = (_text: string | undefined, key: readline.Key | undefined): void => {
      if (!key) return;
      const action = keyToAction(state.geometry, key);
      if (!action) return;

      state = applySelectorAction(state, action);
      if (state.status === 'active') {
        draw();
      } else {
        finish(state.status === 'finalized' ? state.spec : undefined);
      }
    };

    readline.emitKeypressEvents(input);
    input.setRawMode(true);
    input.resume();
    input.on('keypress', onKeypress);
    output.on('resize', draw);
    output.write(ENTER_SCREEN);
    draw();
  });
}
