/**
 * Per-axis lattice index specification.
 */

import { LatticeError } from './errors.js';

// =============================================================================
// Dimension Types
// =============================================================================

/**
 * A single lattice index on one axis.
 */
export interface Single {
  readonly type: 'single';
  readonly index: number;
}

/**
 * An inclusive index range on one axis. Invariant: min <= max.
 */
export interface Range {
  readonly type: 'range';
  readonly min: number;
  readonly max: number;
}

/**
 * Union type for all dimension variants.
 */
export type Dimension = Single | Range;

// =============================================================================
// Factory Functions
// =============================================================================

function requireInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new LatticeError('INVALID_INDEX', `Lattice index must be a safe integer: ${label} = ${value}`);
  }
}

/**
 * Create a Single dimension.
 *
 * @throws LatticeError (INVALID_INDEX) if n is not an integer
 */
export function Single(index: number): Single {
  requireInteger(index, 'index');
  return Object.freeze({ type: 'single', index });
}

/**
 * Create a Range dimension.
 *
 * @throws LatticeError (INVALID_RANGE) if min > max
 */
export function Range(min: number, max: number): Range {
  requireInteger(min, 'min');
  requireInteger(max, 'max');
  if (min > max) {
    throw new LatticeError(
      'INVALID_RANGE',
      `Invalid range ${min}:${max}\n  Minimum must be <= maximum`
    );
  }
  return Object.freeze({ type: 'range', min, max });
}

/**
 * Single when both ends agree, Range otherwise.
 */
export function spanOf(min: number, max: number): Dimension {
  return min === max ? Single(min) : Range(min, max);
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSingle(dim: Dimension): dim is Single {
  return dim.type === 'single';
}

export function isRange(dim: Dimension): dim is Range {
  return dim.type === 'range';
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Format as `n` or `min:max`.
 */
export function formatDimension(dim: Dimension): string {
  switch (dim.type) {
    case 'single':
      return `${dim.index}`;
    case 'range':
      return `${dim.min}:${dim.max}`;
  }
}

/**
 * Number of indices covered on this axis.
 */
export function dimensionSize(dim: Dimension): number {
  switch (dim.type) {
    case 'single':
      return 1;
    case 'range':
      return dim.max - dim.min + 1;
  }
}

/**
 * Lowest and highest index covered.
 */
export function dimensionBounds(dim: Dimension): readonly [number, number] {
  switch (dim.type) {
    case 'single':
      return [dim.index, dim.index];
    case 'range':
      return [dim.min, dim.max];
  }
}
