/**
 * Compass directions for cursor movement across a lattice layer.
 *
 * Rectangular lattices use the four cardinal directions; hexagonal lattices
 * use E/W plus the four diagonals.
 */
export enum Direction {
  N = 'N', // Up (decreasing j)
  S = 'S', // Down (increasing j)
  E = 'E', // Right (increasing i)
  W = 'W', // Left (decreasing i)
  NE = 'NE',
  NW = 'NW',
  SE = 'SE',
  SW = 'SW',
}

/**
 * Get the opposite direction.
 */
export function flipDirection(dir: Direction): Direction {
  switch (dir) {
    case Direction.N:
      return Direction.S;
    case Direction.S:
      return Direction.N;
    case Direction.E:
      return Direction.W;
    case Direction.W:
      return Direction.E;
    case Direction.NE:
      return Direction.SW;
    case Direction.SW:
      return Direction.NE;
    case Direction.NW:
      return Direction.SE;
    case Direction.SE:
      return Direction.NW;
  }
}

export const RECTANGULAR_DIRECTIONS: ReadonlyArray<Direction> = Object.freeze([
  Direction.N,
  Direction.S,
  Direction.E,
  Direction.W,
]);

export const HEXAGONAL_DIRECTIONS: ReadonlyArray<Direction> = Object.freeze([
  Direction.E,
  Direction.W,
  Direction.NE,
  Direction.NW,
  Direction.SE,
  Direction.SW,
]);
