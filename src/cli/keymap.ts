/**
 * Key bindings for the visual selector.
 */

import { Direction } from '../lib/core/direction.js';
import type { GeometryKind } from '../lib/core/types.js';
import type { SelectorAction } from '../lib/selector/selector.js';

/**
 * The parts of a readline keypress event the selector looks at.
 */
export interface KeyPress {
  readonly name?: string;
  readonly sequence?: string;
  readonly ctrl?: boolean;
}

const moveTo = (direction: Direction): SelectorAction => ({ type: 'move', direction });

// Arrow keys; hexagonal rows have no straight up/down neighbour
const ARROWS: Record<GeometryKind, Record<string, Direction>> = {
  rectangular: { up: Direction.N, down: Direction.S, left: Direction.W, right: Direction.E },
  hexagonal: { up: Direction.NW, down: Direction.SE, left: Direction.W, right: Direction.E },
};

const HEX_DIAGONALS: Record<string, Direction> = {
  w: Direction.NW,
  e: Direction.NE,
  z: Direction.SW,
  x: Direction.SE,
};

/**
 * Map a key press to a selector action.
 *
 * @returns The action, or undefined for unbound keys
 */
export function keyToAction(geometry: GeometryKind, key: KeyPress): SelectorAction | undefined {
  if (key.ctrl) {
    return key.name === 'c' ? { type: 'cancel' } : undefined;
  }

  if (key.name !== undefined && key.name in ARROWS[geometry]) {
    return moveTo(ARROWS[geometry][key.name]);
  }

  switch (key.name) {
    case 'space':
    case 'return':
    case 'enter':
      return { type: 'toggle' };
    case 'escape':
      return { type: 'cancel' };
  }

  const ch = key.sequence?.length === 1 ? key.sequence.toLowerCase() : undefined;
  if (ch === undefined) return undefined;

  if (geometry === 'hexagonal' && ch in HEX_DIAGONALS) {
    return moveTo(HEX_DIAGONALS[ch]);
  }

  switch (ch) {
    case '[':
    case ',':
    case '<':
      return { type: 'layer', delta: -1 };
    case ']':
    case '.':
    case '>':
      return { type: 'layer', delta: 1 };
    case 'a':
      return { type: 'selectAll' };
    case 'r':
      return { type: 'clear' };
    case 'c':
      // Rectangular only
      return geometry === 'rectangular' ? { type: 'clear' } : undefined;
    case 'd':
      return { type: 'finalize' };
    case 'q':
      return { type: 'cancel' };
    default:
      return undefined;
  }
}
