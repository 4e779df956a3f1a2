/**
 * Lattice index specifications: which grid positions of a lattice are referenced.
 *
 * Contiguous specs are kept as per-axis ranges end to end and are never
 * expanded into individual positions; a 100x100x50 range stays one token.
 */

import { Dimension, dimensionSize, formatDimension, isSingle } from './dimension.js';
import { LatticeError } from './errors.js';
import { LatticeIndex } from './position.js';

// =============================================================================
// Spec Types
// =============================================================================

/**
 * An axis-aligned box of positions, one Dimension per axis.
 */
export interface ContiguousSpec {
  readonly type: 'contiguous';
  readonly i: Dimension;
  readonly j: Dimension;
  readonly k: Dimension;
}

/**
 * An explicit, ordered set of positions. Non-empty, no repeats.
 */
export interface DiscreteSpec {
  readonly type: 'discrete';
  readonly elements: ReadonlyArray<LatticeIndex>;
}

export type LatticeSpec = ContiguousSpec | DiscreteSpec;

// =============================================================================
// Factory Functions
// =============================================================================

export function Contiguous(i: Dimension, j: Dimension, k: Dimension): ContiguousSpec {
  return Object.freeze({ type: 'contiguous', i, j, k });
}

/**
 * Create a Discrete spec, preserving the given order.
 *
 * @throws LatticeError (EMPTY_SELECTION) if no elements are given
 * @throws LatticeError (DUPLICATE_ELEMENT) if a triple appears twice
 */
export function Discrete(elements: ReadonlyArray<LatticeIndex>): DiscreteSpec {
  if (elements.length === 0) {
    throw new LatticeError('EMPTY_SELECTION', 'A discrete lattice spec needs at least one element');
  }

  const seen = new Set<string>();
  for (const element of elements) {
    for (const value of element.toTuple()) {
      if (!Number.isSafeInteger(value)) {
        throw new LatticeError('INVALID_INDEX', `Lattice index must be a safe integer: ${element}`);
      }
    }
    const key = element.toKey();
    if (seen.has(key)) {
      throw new LatticeError('DUPLICATE_ELEMENT', `Duplicate lattice element ${toSingleToken(element)}`);
    }
    seen.add(key);
  }

  return Object.freeze({ type: 'discrete', elements: Object.freeze([...elements]) });
}

// =============================================================================
// Type Guards
// =============================================================================

export function isContiguous(spec: LatticeSpec): spec is ContiguousSpec {
  return spec.type === 'contiguous';
}

export function isDiscrete(spec: LatticeSpec): spec is DiscreteSpec {
  return spec.type === 'discrete';
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * `[i j k]` with each axis as `n` or `min:max`. Axes are space-separated;
 * the downstream grammar rejects commas.
 */
export function toRangeToken(spec: ContiguousSpec): string {
  return `[${formatDimension(spec.i)} ${formatDimension(spec.j)} ${formatDimension(spec.k)}]`;
}

/**
 * `[i j k]` for one explicit position.
 */
export function toSingleToken(element: LatticeIndex): string {
  return `[${element.i} ${element.j} ${element.k}]`;
}

/**
 * Short summary for stack listings.
 */
export function describeSpec(spec: LatticeSpec): string {
  switch (spec.type) {
    case 'contiguous':
      return toRangeToken(spec);
    case 'discrete':
      return `NonContiguous[${spec.elements.length} elements]`;
  }
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Number of lattice positions represented.
 */
export function elementCount(spec: LatticeSpec): number {
  switch (spec.type) {
    case 'contiguous':
      return dimensionSize(spec.i) * dimensionSize(spec.j) * dimensionSize(spec.k);
    case 'discrete':
      return spec.elements.length;
  }
}

/**
 * The position, if the spec addresses exactly one.
 */
export function singleElement(spec: LatticeSpec): LatticeIndex | undefined {
  if (spec.type === 'discrete') {
    return spec.elements.length === 1 ? spec.elements[0] : undefined;
  }
  const { i, j, k } = spec;
  if (isSingle(i) && isSingle(j) && isSingle(k)) {
    return new LatticeIndex(i.index, j.index, k.index);
  }
  return undefined;
}

export function isSingleElement(spec: LatticeSpec): boolean {
  return singleElement(spec) !== undefined;
}

/**
 * All positions of a Discrete spec. Contiguous specs are not enumerated.
 */
export function enumerateElements(spec: LatticeSpec): ReadonlyArray<LatticeIndex> | undefined {
  return spec.type === 'discrete' ? spec.elements : undefined;
}
