/**
 * Neighbour offsets for rectangular and hexagonal lattice layers.
 *
 * Hexagonal layers use offset coordinates with odd rows (odd j) shifted right:
 *
 *      0   1   2
 *    0  .   .   .
 *        1  .   .   .
 *    2  .   .   .
 *
 * so the diagonal neighbours of a cell depend on the parity of its row.
 */

import { Direction } from '../core/direction.js';
import type { GeometryKind } from '../core/types.js';

type Offset = readonly [number, number];

/** Rectangular deltas as [di, dj]. */
const RECT_DELTAS: Partial<Record<Direction, Offset>> = {
  [Direction.N]: [0, -1],
  [Direction.S]: [0, 1],
  [Direction.E]: [1, 0],
  [Direction.W]: [-1, 0],
};

/** Hexagonal deltas for even rows. */
const HEX_EVEN_DELTAS: Partial<Record<Direction, Offset>> = {
  [Direction.E]: [1, 0],
  [Direction.W]: [-1, 0],
  [Direction.NE]: [0, -1],
  [Direction.NW]: [-1, -1],
  [Direction.SE]: [0, 1],
  [Direction.SW]: [-1, 1],
};

/** Hexagonal deltas for odd rows. */
const HEX_ODD_DELTAS: Partial<Record<Direction, Offset>> = {
  [Direction.E]: [1, 0],
  [Direction.W]: [-1, 0],
  [Direction.NE]: [1, -1],
  [Direction.NW]: [0, -1],
  [Direction.SE]: [1, 1],
  [Direction.SW]: [0, 1],
};

/**
 * Whether row j is shifted right. Works for negative rows (j = -1 is odd).
 */
export function isOddRow(j: number): boolean {
  return Math.abs(j % 2) === 1;
}

/**
 * Neighbour of (i, j) in a hexagonal layer.
 *
 * @returns The neighbour, or undefined for N/S which have no hex neighbour
 */
export function hexNeighbor(i: number, j: number, direction: Direction): [number, number] | undefined {
  const delta = (isOddRow(j) ? HEX_ODD_DELTAS : HEX_EVEN_DELTAS)[direction];
  return delta ? [i + delta[0], j + delta[1]] : undefined;
}

/**
 * Neighbour of (i, j) in a rectangular layer.
 *
 * @returns The neighbour, or undefined for diagonal directions
 */
export function rectNeighbor(i: number, j: number, direction: Direction): [number, number] | undefined {
  const delta = RECT_DELTAS[direction];
  return delta ? [i + delta[0], j + delta[1]] : undefined;
}

export function neighbor(
  geometry: GeometryKind,
  i: number,
  j: number,
  direction: Direction
): [number, number] | undefined {
  return geometry === 'hexagonal' ? hexNeighbor(i, j, direction) : rectNeighbor(i, j, direction);
}
