/**
 * Core data structures for containment stacks.
 */

import { LatticeError } from './errors.js';
import { describeSpec, type LatticeSpec } from './lattice-spec.js';

// =============================================================================
// Geometry
// =============================================================================

/**
 * Lattice geometry: LAT=1 (rectangular) or LAT=2 (hexagonal).
 */
export type GeometryKind = 'rectangular' | 'hexagonal';

/**
 * Map the numeric LAT value used on cell cards to a geometry kind.
 *
 * @returns The geometry, or undefined for any other value
 */
export function geometryFromLat(lat: number): GeometryKind | undefined {
  if (lat === 1) return 'rectangular';
  if (lat === 2) return 'hexagonal';
  return undefined;
}

export function latFromGeometry(geometry: GeometryKind): 1 | 2 {
  return geometry === 'rectangular' ? 1 : 2;
}

/**
 * Inclusive integer range on one axis.
 */
export interface AxisRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Per-axis inclusive bounds. For a bounded lattice these are the declared FILL
 * bounds; for an infinite lattice they are only a viewing window.
 */
export interface LatticeBounds {
  readonly i: AxisRange;
  readonly j: AxisRange;
  readonly k: AxisRange;
}

/**
 * Create frozen bounds.
 *
 * @throws LatticeError (INVALID_RANGE) if any axis has min > max
 */
export function createBounds(
  i: readonly [number, number],
  j: readonly [number, number],
  k: readonly [number, number]
): LatticeBounds {
  const axis = (name: string, [min, max]: readonly [number, number]): AxisRange => {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
      throw new LatticeError('INVALID_INDEX', `Bounds on axis ${name} must be integers: ${min}:${max}`);
    }
    if (min > max) {
      throw new LatticeError('INVALID_RANGE', `Invalid bounds on axis ${name}: ${min}:${max}`);
    }
    return Object.freeze({ min, max });
  };
  return Object.freeze({ i: axis('i', i), j: axis('j', j), k: axis('k', k) });
}

export function axisSize(range: AxisRange): number {
  return range.max - range.min + 1;
}

export function inAxis(range: AxisRange, value: number): boolean {
  return value >= range.min && value <= range.max;
}

// =============================================================================
// Containment Node
// =============================================================================

/**
 * One level of a containment stack.
 *
 * @property cellId - Cell identifier
 * @property universe - Universe the cell resides in (0 = global)
 * @property fillUniverse - Universe this cell is filled with (non-leaf nodes only)
 * @property isLattice - Whether the cell is a lattice (LAT=1 or LAT=2)
 * @property isInfiniteLattice - Simple fill (FILL=n) without declared bounds
 * @property latticeSpec - Which lattice positions are referenced
 * @property geometry - Lattice geometry
 * @property bounds - Declared bounds, or the viewing window of an infinite lattice
 */
export interface ContainmentNode {
  readonly cellId: number;
  readonly universe: number;
  readonly fillUniverse?: number;
  readonly isLattice: boolean;
  readonly isInfiniteLattice: boolean;
  readonly latticeSpec?: LatticeSpec;
  readonly geometry?: GeometryKind;
  readonly bounds?: LatticeBounds;
}

/**
 * Fields accepted by createNode. Flags default to false.
 */
export interface NodeInit {
  cellId: number;
  universe: number;
  fillUniverse?: number;
  isLattice?: boolean;
  isInfiniteLattice?: boolean;
  latticeSpec?: LatticeSpec;
  geometry?: GeometryKind;
  bounds?: LatticeBounds;
}

/**
 * Create a frozen ContainmentNode.
 *
 * @throws LatticeError (INVALID_NODE) if lattice-only fields are set on a
 *         non-lattice node, or identifiers are not integers
 */
export function createNode(init: NodeInit): ContainmentNode {
  const isLattice = init.isLattice ?? false;
  const isInfiniteLattice = init.isInfiniteLattice ?? false;

  const ids: Array<[string, number | undefined]> = [
    ['cell', init.cellId],
    ['universe', init.universe],
    ['fill universe', init.fillUniverse],
  ];
  for (const [label, value] of ids) {
    if (value !== undefined && !Number.isSafeInteger(value)) {
      throw new LatticeError('INVALID_NODE', `Invalid ${label} number: ${value}`);
    }
  }

  if (!isLattice) {
    const latticeOnly: string[] = [];
    if (init.latticeSpec) latticeOnly.push('lattice spec');
    if (init.geometry) latticeOnly.push('geometry');
    if (init.bounds) latticeOnly.push('bounds');
    if (isInfiniteLattice) latticeOnly.push('infinite flag');
    if (latticeOnly.length > 0) {
      throw new LatticeError(
        'INVALID_NODE',
        `Cell ${init.cellId} is not a lattice but has: ${latticeOnly.join(', ')}`
      );
    }
  }

  const node: ContainmentNode = {
    cellId: init.cellId,
    universe: init.universe,
    isLattice,
    isInfiniteLattice,
    ...(init.fillUniverse !== undefined ? { fillUniverse: init.fillUniverse } : {}),
    ...(init.latticeSpec ? { latticeSpec: init.latticeSpec } : {}),
    ...(init.geometry ? { geometry: init.geometry } : {}),
    ...(init.bounds ? { bounds: init.bounds } : {}),
  };
  return Object.freeze(node);
}

/**
 * Return a copy of the node with a lattice spec attached.
 */
export function withLatticeSpec(node: ContainmentNode, spec: LatticeSpec): ContainmentNode {
  return createNode({ ...node, latticeSpec: spec });
}

/**
 * Human-readable summary, e.g. `Cell 50 in U=100 [LAT spec: [3 4 0]] (fills U=5)`.
 */
export function describeNode(node: ContainmentNode): string {
  const lat = node.latticeSpec ? ` [LAT spec: ${describeSpec(node.latticeSpec)}]` : '';
  const fill = node.fillUniverse ? ` (fills U=${node.fillUniverse})` : '';
  return `Cell ${node.cellId} in U=${node.universe}${lat}${fill}`;
}
