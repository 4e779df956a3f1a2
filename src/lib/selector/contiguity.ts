/**
 * Turn a set of selected lattice positions into the most compact spec.
 */

import { spanOf } from '../core/dimension.js';
import { LatticeError } from '../core/errors.js';
import { Contiguous, Discrete, type LatticeSpec } from '../core/lattice-spec.js';
import { compareIndices, LatticeIndex } from '../core/position.js';

/**
 * Axis-aligned bounding box over i, j and k jointly.
 */
export interface SelectionBox {
  readonly i: readonly [number, number];
  readonly j: readonly [number, number];
  readonly k: readonly [number, number];
}

export function boundingBox(indices: Iterable<LatticeIndex>): SelectionBox | undefined {
  let box: { i: [number, number]; j: [number, number]; k: [number, number] } | undefined;
  for (const { i, j, k } of indices) {
    if (!box) {
      box = { i: [i, i], j: [j, j], k: [k, k] };
      continue;
    }
    box.i = [Math.min(box.i[0], i), Math.max(box.i[1], i)];
    box.j = [Math.min(box.j[0], j), Math.max(box.j[1], j)];
    box.k = [Math.min(box.k[0], k), Math.max(box.k[1], k)];
  }
  return box;
}

export function boxVolume(box: SelectionBox): number {
  return (box.i[1] - box.i[0] + 1) * (box.j[1] - box.j[0] + 1) * (box.k[1] - box.k[0] + 1);
}

/**
 * Whether the selection fills its bounding box exactly.
 */
export function isContiguousSelection(selected: ReadonlyMap<string, LatticeIndex>): boolean {
  const box = boundingBox(selected.values());
  if (!box) {
    return true;
  }
  if (boxVolume(box) !== selected.size) {
    return false;
  }
  for (let i = box.i[0]; i <= box.i[1]; i++) {
    for (let j = box.j[0]; j <= box.j[1]; j++) {
      for (let k = box.k[0]; k <= box.k[1]; k++) {
        if (!selected.has(new LatticeIndex(i, j, k).toKey())) {
          return false;
        }
      }
    }
  }
  return true;
}

/**
 * Contiguous spec for a box-shaped selection, Discrete (sorted by i, j, k)
 * otherwise.
 *
 * @throws LatticeError (EMPTY_SELECTION) if nothing is selected
 */
export function analyzeSelection(indices: Iterable<LatticeIndex>): LatticeSpec {
  const selected = new Map<string, LatticeIndex>();
  for (const index of indices) {
    selected.set(index.toKey(), index);
  }

  const box = boundingBox(selected.values());
  if (!box) {
    throw new LatticeError('EMPTY_SELECTION', 'No lattice elements selected');
  }

  if (isContiguousSelection(selected)) {
    return Contiguous(spanOf(...box.i), spanOf(...box.j), spanOf(...box.k));
  }

  return Discrete([...selected.values()].sort(compareIndices));
}
