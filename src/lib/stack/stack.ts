/**
 * Containment stacks: the chain from a target cell up to the global universe.
 *
 * Index 0 is the target (innermost) cell, the last node lives in universe 0.
 * Stacks are built bottom-up one level at a time; each step returns a new
 * value, and the finished stack is frozen.
 */

import { LatticeError } from '../core/errors.js';
import type { ContainmentNode } from '../core/types.js';

/**
 * A validated, immutable containment stack.
 */
export type ContainmentStack = ReadonlyArray<ContainmentNode>;

/**
 * Validation error details.
 */
export interface StackValidationError {
  /** Human-readable error message */
  readonly message: string;
  /** Index in the stack where the error occurred (if applicable) */
  readonly level?: number;
}

/**
 * Result of stack validation.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly error?: StackValidationError;
}

const VALID: ValidationResult = Object.freeze({ valid: true });

function invalid(message: string, level?: number): ValidationResult {
  return Object.freeze({
    valid: false,
    error: Object.freeze(level === undefined ? { message } : { message, level }),
  });
}

/**
 * Validate a containment stack.
 *
 * Checks that:
 * 1. The stack is non-empty
 * 2. Each outer node fills the universe its inner neighbour resides in
 * 3. Only the last node resides in universe 0
 * 4. Lattice specs appear only on lattice nodes
 *
 * @example
 * ```typescript
 * const result = validateStack(nodes);
 * if (!result.valid) {
 *   console.error(`Invalid stack: ${result.error?.message}`);
 * }
 * ```
 */
export function validateStack(nodes: ReadonlyArray<ContainmentNode>): ValidationResult {
  if (nodes.length === 0) {
    return invalid('Stack is empty');
  }

  for (let level = 0; level < nodes.length; level++) {
    const node = nodes[level];
    const isLast = level === nodes.length - 1;

    if (node.latticeSpec && !node.isLattice) {
      return invalid(`Cell ${node.cellId} carries a lattice spec but is not a lattice`, level);
    }

    if (isLast && node.universe !== 0) {
      return invalid(
        `Outermost cell ${node.cellId} is in U=${node.universe}, expected the global universe (U=0)`,
        level
      );
    }
    if (!isLast && node.universe === 0) {
      return invalid(
        `Cell ${node.cellId} is in the global universe but is not the outermost level`,
        level
      );
    }

    if (level > 0) {
      const inner = nodes[level - 1];
      if (node.fillUniverse !== inner.universe) {
        return invalid(
          `Cell ${node.cellId} fills U=${node.fillUniverse ?? 'none'} ` +
            `but Cell ${inner.cellId} is in U=${inner.universe}`,
          level
        );
      }
    }
  }

  return VALID;
}

/**
 * Validate and freeze a stack.
 *
 * @throws LatticeError (INVALID_STACK) if any invariant is violated
 */
export function createStack(nodes: ReadonlyArray<ContainmentNode>): ContainmentStack {
  const result = validateStack(nodes);
  if (!result.valid) {
    const level = result.error?.level;
    const where = level === undefined ? '' : ` (level ${level})`;
    throw new LatticeError('INVALID_STACK', `Invalid containment stack${where}: ${result.error?.message}`);
  }
  return Object.freeze([...nodes]);
}

// =============================================================================
// Bottom-up construction
// =============================================================================

/**
 * A partially built stack. Unlike ContainmentStack it may still end in a
 * non-global universe.
 */
export interface StackDraft {
  readonly nodes: ReadonlyArray<ContainmentNode>;
  /** Universe that the next (outer) node must fill, or 0 when complete */
  readonly openUniverse: number;
}

/**
 * Begin a stack at the target cell.
 */
export function startStack(target: ContainmentNode): StackDraft {
  return Object.freeze({ nodes: Object.freeze([target]), openUniverse: target.universe });
}

/**
 * Append the cell that fills the draft's open universe.
 *
 * @throws LatticeError (INVALID_STACK) if the draft is already complete or
 *         the parent fills a different universe
 */
export function climbStack(draft: StackDraft, parent: ContainmentNode): StackDraft {
  if (draft.openUniverse === 0) {
    throw new LatticeError('INVALID_STACK', 'Stack already reaches the global universe');
  }
  if (parent.fillUniverse !== draft.openUniverse) {
    throw new LatticeError(
      'INVALID_STACK',
      `Cell ${parent.cellId} fills U=${parent.fillUniverse ?? 'none'}, expected U=${draft.openUniverse}`
    );
  }
  return Object.freeze({
    nodes: Object.freeze([...draft.nodes, parent]),
    openUniverse: parent.universe,
  });
}

export function isDraftComplete(draft: StackDraft): boolean {
  return draft.openUniverse === 0;
}

/**
 * Finish a draft that reaches the global universe.
 *
 * @throws LatticeError (INVALID_STACK) if the draft is incomplete or invalid
 */
export function completeStack(draft: StackDraft): ContainmentStack {
  if (!isDraftComplete(draft)) {
    throw new LatticeError(
      'INVALID_STACK',
      `Stack is incomplete: no cell fills U=${draft.openUniverse} yet`
    );
  }
  return createStack(draft.nodes);
}

/**
 * Target cell id (index 0).
 */
export function targetCellOf(stack: ContainmentStack): number | undefined {
  return stack.length > 0 ? stack[0].cellId : undefined;
}
