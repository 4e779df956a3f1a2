/**
 * Parse lattice index text as typed by an operator.
 */

import { Range, Single, type Dimension } from '../core/dimension.js';
import { LatticeError } from '../core/errors.js';
import { Contiguous, type ContiguousSpec } from '../core/lattice-spec.js';

const INTEGER = /^[+-]?\d+$/;

function parseInteger(text: string, context: string): number {
  const trimmed = text.trim();
  if (!INTEGER.test(trimmed)) {
    throw new LatticeError('INVALID_INDEX', `Invalid number '${trimmed}' in ${context}`);
  }
  const value = parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new LatticeError('INVALID_INDEX', `Number '${trimmed}' is out of range in ${context}`);
  }
  return value;
}

/**
 * Parse one axis: `5` -> Single(5), `0:9` -> Range(0, 9).
 *
 * @example
 * parseDimension("5")     // Single(5)
 * parseDimension("-2:3")  // Range(-2, 3)
 * parseDimension("3:1")   // throws INVALID_RANGE
 *
 * @throws LatticeError (INVALID_INDEX) for malformed text,
 *         (INVALID_RANGE) when min > max
 */
export function parseDimension(text: string): Dimension {
  const trimmed = text.trim();
  if (!trimmed.includes(':')) {
    return Single(parseInteger(trimmed, `index '${trimmed}'`));
  }

  const parts = trimmed.split(':');
  if (parts.length !== 2) {
    throw new LatticeError(
      'INVALID_INDEX',
      `Invalid range format '${trimmed}'. Use 'min:max' (e.g., 0:9)`
    );
  }
  const min = parseInteger(parts[0], `range '${trimmed}'`);
  const max = parseInteger(parts[1], `range '${trimmed}'`);
  return Range(min, max);
}

/**
 * Parse three space-separated axes, with or without brackets:
 * `3 4 0`, `[0:9 0:9 0]`.
 *
 * @throws LatticeError if there are not exactly three axes or any axis is invalid
 */
export function parseIndexSpec(text: string): ContiguousSpec {
  const body = text.trim().replace(/^\[/, '').replace(/\]$/, '').trim();
  if (body.includes(',')) {
    throw new LatticeError(
      'INVALID_INDEX',
      `Invalid lattice index '${text}'\n  Axes are separated by spaces, not commas (e.g., '0:9 0:9 0')`
    );
  }
  const axes = body.split(/\s+/).filter(part => part.length > 0);
  if (axes.length !== 3) {
    throw new LatticeError(
      'INVALID_INDEX',
      `Invalid lattice index '${text}'\n  Expected 3 axes (i j k), got ${axes.length}`
    );
  }
  const [i, j, k] = axes.map(parseDimension);
  return Contiguous(i, j, k);
}
