/**
 * Text renderer for the grid selector.
 * Turns a selector snapshot into screen lines; the terminal driver only writes them.
 *
 * Rectangular layer (cursor at i=1, j=0; i=0 selected):
 *
 *         0   1   2
 *       ┌───────────┐
 *     0 │ █   ░   · │
 *     1 │ ·   ·   · │
 *       └───────────┘
 *
 * Hexagonal layer, odd rows shifted right:
 *
 *         0   1   2
 *       0  X   █   ·
 *       1    ·   @   ·
 */

import { latticeFailure, type LatticeFailure } from '../core/errors.js';
import { isSelected, type SelectorState } from '../selector/selector.js';
import { isOddRow } from '../selector/neighbors.js';

export interface Viewport {
  readonly rows: number;
  readonly cols: number;
}

export interface RenderedScreen {
  readonly lines: ReadonlyArray<string>;
  /** Widest line */
  readonly width: number;
}

export interface Glyphs {
  readonly empty: string;
  readonly cursor: string;
  readonly selected: string;
  readonly cursorSelected: string;
}

export const RECT_GLYPHS: Glyphs = Object.freeze({
  empty: '·',
  cursor: '░',
  selected: '█',
  cursorSelected: '▓',
});

export const HEX_GLYPHS: Glyphs = Object.freeze({
  empty: '·',
  cursor: '█',
  selected: 'X',
  cursorSelected: '@',
});

const RECT_HELP = [
  'Arrow Keys: Move cursor  |  Space/Enter: Toggle  |  [/] or ,/. : K-layer',
  'a: Select all  |  c: Clear all  |  d: Done  |  q/ESC: Cancel',
];

const HEX_HELP = [
  'Arrow Keys: Move (6-dir hex)  |  W/E/Z/X: Diagonals  |  Space/Enter: Toggle',
  '[/] or ,/. : K-layer  |  a: Select all  |  r: Clear  |  d: Done  |  q/ESC: Cancel',
];

function range(min: number, max: number): number[] {
  const values: number[] = [];
  for (let v = min; v <= max; v++) values.push(v);
  return values;
}

function glyph(state: SelectorState, i: number, j: number, glyphs: Glyphs): string {
  const atCursor = i === state.cursorI && j === state.cursorJ;
  const selected = isSelected(state, i, j, state.layer);
  if (atCursor && selected) return glyphs.cursorSelected;
  if (atCursor) return glyphs.cursor;
  if (selected) return glyphs.selected;
  return glyphs.empty;
}

// The widest label on an axis belongs to one of its ends.
function labelWidth(min: number, max: number, least: number): number {
  return Math.max(least, String(min).length, String(max).length);
}

/**
 * Column geometry for a window: labels are right-aligned over the glyph and
 * each cell is two columns wider than the widest label.
 */
function columns(state: SelectorState): { is: number[]; label: number; cell: number } {
  const label = labelWidth(state.window.i.min, state.window.i.max, 2);
  return { is: range(state.window.i.min, state.window.i.max), label, cell: label + 2 };
}

/**
 * The current layer of a rectangular lattice as a boxed grid.
 */
export function renderRectangularLayer(state: SelectorState): string[] {
  const { is, label, cell } = columns(state);
  const js = range(state.window.j.min, state.window.j.max);
  const rowLabel = labelWidth(state.window.j.min, state.window.j.max, 3);
  const margin = ' '.repeat(rowLabel + 1);
  const inner = '─'.repeat(is.length * cell - 1);
  const lead = ' '.repeat(label - 1);

  const lines = [
    margin + ' ' + is.map(i => String(i).padStart(label).padEnd(cell)).join(''),
    `${margin}┌${inner}┐`,
  ];
  for (const j of js) {
    const cells = is.map(i => `${lead}${glyph(state, i, j, RECT_GLYPHS)} `).join(' ');
    lines.push(`${String(j).padStart(rowLabel)} │${cells}│`);
  }
  lines.push(`${margin}└${inner}┘`);
  return lines.map(line => line.trimEnd());
}

/**
 * The current layer of a hexagonal lattice in compact offset form.
 */
export function renderHexagonalLayer(state: SelectorState): string[] {
  const { is, label, cell } = columns(state);
  const js = range(state.window.j.min, state.window.j.max);
  const rowLabel = labelWidth(state.window.j.min, state.window.j.max, 2);
  const lead = ' '.repeat(label - 1);
  const halfCell = ' '.repeat(Math.floor(cell / 2));

  const lines = [' '.repeat(rowLabel + 1) + is.map(i => String(i).padStart(label).padEnd(cell)).join('')];
  for (const j of js) {
    const shift = isOddRow(j) ? halfCell : '';
    const cells = is.map(i => `${lead}${glyph(state, i, j, HEX_GLYPHS)}  `).join('');
    lines.push(`${String(j).padStart(rowLabel)} ${shift}${cells}`);
  }
  lines.push('');
  lines.push('Legend: X=Selected  ·=Unselected  █=Cursor  @=Cursor+Selected');
  lines.push('Note: Odd rows (j) shifted right to show hexagonal adjacency');
  return lines.map(line => line.trimEnd());
}

/**
 * Full selector screen: title, key help, status line and the current layer.
 */
export function renderScreenLines(state: SelectorState): string[] {
  const hex = state.geometry === 'hexagonal';
  const title = `VISUAL LATTICE SELECTOR - ${hex ? 'Hexagonal' : 'Rectangular'} Lattice`;

  return [
    title,
    state.unbounded ? '(Viewing window mode - lattice is actually infinite)' : '',
    ...(hex ? HEX_HELP : RECT_HELP),
    '',
    `K-Layer: ${state.layer}  |  Selected: ${state.selected.size} cells`,
    state.message ?? '',
    ...(hex ? renderHexagonalLayer(state) : renderRectangularLayer(state)),
  ];
}

/**
 * Render the selector for a terminal of the given size.
 *
 * @returns The screen, or VIEWPORT_TOO_SMALL if it does not fit; the caller
 *          keeps its state and may retry after a resize
 */
export function renderSelector(state: SelectorState, viewport: Viewport): RenderedScreen | LatticeFailure {
  const lines = renderScreenLines(state);
  const width = Math.max(...lines.map(line => line.length));

  if (lines.length > viewport.rows || width > viewport.cols) {
    return latticeFailure(
      'VIEWPORT_TOO_SMALL',
      `Terminal window too small! Need ${width}x${lines.length}, have ${viewport.cols}x${viewport.rows}. Please resize.`
    );
  }

  return Object.freeze({ lines: Object.freeze(lines), width });
}
