/**
 * Build containment path strings from a stack.
 *
 * Paths read bottom-up, innermost cell first:
 *
 *   ( 101 < 50[0:9 0:9 0] < 1 )
 *
 * A lattice node's index token follows its cell id with no space. When one
 * lattice addresses a non-contiguous set of positions, the tally path becomes
 * a union with one parenthesized path per position:
 *
 *   ( (101 < 50[0 0 0] < 1) (101 < 50[9 9 0] < 1) )
 */

import { latticeFailure, LatticeError, type LatticeFailure } from '../core/errors.js';
import { toRangeToken, toSingleToken, type DiscreteSpec } from '../core/lattice-spec.js';
import type { LatticeIndex } from '../core/position.js';
import type { ContainmentNode } from '../core/types.js';

const PATH_SEPARATOR = ' < ';

/**
 * A node whose spec is Discrete, with its position in the stack.
 */
export interface DiscreteNode {
  readonly level: number;
  readonly node: ContainmentNode;
  readonly spec: DiscreteSpec;
}

/**
 * All nodes carrying a Discrete spec, in stack order.
 */
export function findDiscreteNodes(stack: ReadonlyArray<ContainmentNode>): DiscreteNode[] {
  const found: DiscreteNode[] = [];
  stack.forEach((node, level) => {
    const spec = node.latticeSpec;
    if (node.isLattice && spec && spec.type === 'discrete') {
      found.push({ level, node, spec });
    }
  });
  return found;
}

/**
 * The first node carrying a Discrete spec. Later ones are ignored by the
 * union builder.
 */
export function findDiscreteNode(stack: ReadonlyArray<ContainmentNode>): DiscreteNode | undefined {
  return findDiscreteNodes(stack)[0];
}

export function hasDiscreteLattice(stack: ReadonlyArray<ContainmentNode>): boolean {
  return findDiscreteNode(stack) !== undefined;
}

/**
 * Report when more than one node carries a Discrete spec.
 *
 * @returns AMBIGUOUS_NON_CONTIGUITY failure naming the honoured and ignored
 *          cells, or undefined if there is at most one
 */
export function checkDiscreteAmbiguity(stack: ReadonlyArray<ContainmentNode>): LatticeFailure | undefined {
  const nodes = findDiscreteNodes(stack);
  if (nodes.length <= 1) {
    return undefined;
  }
  const [used, ...ignored] = nodes;
  return latticeFailure(
    'AMBIGUOUS_NON_CONTIGUITY',
    `Cells ${nodes.map(d => d.node.cellId).join(', ')} all have non-contiguous selections; ` +
      `using Cell ${used.node.cellId}, ignoring ${ignored.map(d => `Cell ${d.node.cellId}`).join(', ')}`
  );
}

/**
 * Path token for one node: the cell id, plus its index token for lattices.
 */
function nodeToken(node: ContainmentNode, overrideElement?: LatticeIndex): string {
  const spec = node.latticeSpec;
  if (!node.isLattice || !spec) {
    return `${node.cellId}`;
  }
  if (spec.type === 'discrete') {
    return overrideElement ? `${node.cellId}${toSingleToken(overrideElement)}` : `${node.cellId}`;
  }
  return `${node.cellId}${toRangeToken(spec)}`;
}

/**
 * Build one path through the stack, e.g. `101 < 50[3 4 0] < 1`.
 *
 * @param overrideElement - Position to use for Discrete lattice nodes
 */
export function buildSinglePath(
  stack: ReadonlyArray<ContainmentNode>,
  overrideElement?: LatticeIndex
): string {
  return stack.map(node => nodeToken(node, overrideElement)).join(PATH_SEPARATOR);
}

/**
 * Union of single paths over the first Discrete node's elements:
 * `( (path1) (path2) ... )`.
 */
export function buildUnionPaths(stack: ReadonlyArray<ContainmentNode>): string {
  const discrete = findDiscreteNode(stack);
  if (!discrete) {
    return buildSinglePath(stack);
  }

  const paths = discrete.spec.elements.map(element => `(${buildSinglePath(stack, element)})`);
  return `( ${paths.join(' ')} )`;
}

/**
 * The path to place on a tally card.
 *
 * @param targetCell - Used when the stack is empty
 * @throws LatticeError (INVALID_STACK) for an empty stack with no target cell
 */
export function buildTallyPath(stack: ReadonlyArray<ContainmentNode>, targetCell?: number): string {
  if (stack.length === 0) {
    if (targetCell === undefined) {
      throw new LatticeError('INVALID_STACK', 'Cannot build a path: stack is empty and no target cell given');
    }
    return `( ${targetCell} )`;
  }

  if (hasDiscreteLattice(stack)) {
    return buildUnionPaths(stack);
  }

  return `( ${buildSinglePath(stack)} )`;
}

/**
 * Entries for a source information (SI) list: one `(path)` per position of a
 * Discrete lattice, or the single tally path otherwise.
 */
export function buildSourcePaths(stack: ReadonlyArray<ContainmentNode>, targetCell?: number): string[] {
  const discrete = findDiscreteNode(stack);
  if (!discrete) {
    return [buildTallyPath(stack, targetCell)];
  }
  return discrete.spec.elements.map(element => `(${buildSinglePath(stack, element)})`);
}

/**
 * Whether a segment divisor (volume) card is required: the volume of a cell
 * inside a lattice cannot be computed by the transport code.
 */
export function needsVolumeCard(stack: ReadonlyArray<ContainmentNode>): boolean {
  return stack.slice(1).some(node => node.isLattice);
}
