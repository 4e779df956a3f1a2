/**
 * Grid selection state machine.
 *
 * Every operation takes a snapshot and returns a new one; rendering and key
 * handling live outside. States:
 *
 *   active --finalize--> finalized (spec attached)
 *   active --cancel----> cancelled
 *
 * Operations on a finalized or cancelled snapshot return it unchanged.
 */

import type { Direction } from '../core/direction.js';
import { latticeFailure, type LatticeFailure } from '../core/errors.js';
import type { LatticeSpec } from '../core/lattice-spec.js';
import { LatticeIndex } from '../core/position.js';
import { inAxis, type GeometryKind, type LatticeBounds } from '../core/types.js';
import { analyzeSelection } from './contiguity.js';
import { neighbor } from './neighbors.js';

export type SelectorStatus = 'active' | 'finalized' | 'cancelled';

export interface SelectorState {
  readonly status: SelectorStatus;
  readonly geometry: GeometryKind;
  /** Selectable and displayed range on each axis */
  readonly window: LatticeBounds;
  /**
   * The lattice itself is infinite and `window` is only a viewing window.
   * Selection is still limited to the window.
   */
  readonly unbounded: boolean;
  readonly cursorI: number;
  readonly cursorJ: number;
  readonly layer: number;
  /** Selected positions keyed by LatticeIndex.toKey() */
  readonly selected: ReadonlyMap<string, LatticeIndex>;
  /** Set once finalized */
  readonly spec?: LatticeSpec;
  /** Feedback for the last rejected action */
  readonly message?: string;
}

export interface SelectorOptions {
  readonly geometry: GeometryKind;
  readonly window: LatticeBounds;
  readonly unbounded?: boolean;
}

const midpoint = (min: number, max: number): number => Math.floor((min + max) / 2);

/**
 * Start a selection session with the cursor in the middle of the window.
 */
export function createSelector(options: SelectorOptions): SelectorState {
  const { geometry, window } = options;
  return Object.freeze({
    status: 'active',
    geometry,
    window,
    unbounded: options.unbounded ?? false,
    cursorI: midpoint(window.i.min, window.i.max),
    cursorJ: midpoint(window.j.min, window.j.max),
    layer: midpoint(window.k.min, window.k.max),
    selected: new Map(),
  });
}

// Any accepted action clears the previous message.
function update(state: SelectorState, changes: Partial<SelectorState>): SelectorState {
  return Object.freeze({ ...state, message: undefined, ...changes });
}

export function isActive(state: SelectorState): boolean {
  return state.status === 'active';
}

export function cursorIndex(state: SelectorState): LatticeIndex {
  return new LatticeIndex(state.cursorI, state.cursorJ, state.layer);
}

export function isSelected(state: SelectorState, i: number, j: number, k: number): boolean {
  return state.selected.has(new LatticeIndex(i, j, k).toKey());
}

/**
 * Move the cursor one step. Moves that leave the window, or that the geometry
 * has no neighbour for, leave the cursor where it is.
 */
export function move(state: SelectorState, direction: Direction): SelectorState {
  if (!isActive(state)) return state;

  const next = neighbor(state.geometry, state.cursorI, state.cursorJ, direction);
  if (!next) return state;

  const [i, j] = next;
  if (!inAxis(state.window.i, i) || !inAxis(state.window.j, j)) {
    return state;
  }
  return update(state, { cursorI: i, cursorJ: j });
}

/**
 * Change the depth layer, clamped to the k range of the window.
 */
export function changeLayer(state: SelectorState, delta: number): SelectorState {
  if (!isActive(state)) return state;

  const { min, max } = state.window.k;
  const layer = Math.min(max, Math.max(min, state.layer + delta));
  return layer === state.layer ? state : update(state, { layer });
}

/**
 * Add or remove the position under the cursor on the current layer.
 */
export function toggleSelection(state: SelectorState): SelectorState {
  if (!isActive(state)) return state;

  const index = cursorIndex(state);
  const selected = new Map(state.selected);
  if (selected.has(index.toKey())) {
    selected.delete(index.toKey());
  } else {
    selected.set(index.toKey(), index);
  }
  return update(state, { selected });
}

/**
 * Select every position of the window, on every layer.
 */
export function selectAll(state: SelectorState): SelectorState {
  if (!isActive(state)) return state;

  const { i, j, k } = state.window;
  const selected = new Map(state.selected);
  for (let ii = i.min; ii <= i.max; ii++) {
    for (let jj = j.min; jj <= j.max; jj++) {
      for (let kk = k.min; kk <= k.max; kk++) {
        const index = new LatticeIndex(ii, jj, kk);
        selected.set(index.toKey(), index);
      }
    }
  }
  return update(state, { selected });
}

export function clearSelection(state: SelectorState): SelectorState {
  if (!isActive(state)) return state;
  return update(state, { selected: new Map() });
}

/**
 * Commit the selection.
 *
 * @returns The finalized snapshot carrying the spec, or EMPTY_SELECTION if
 *          nothing is selected (the session stays active)
 */
export function finalize(state: SelectorState): SelectorState | LatticeFailure {
  if (!isActive(state)) return state;

  if (state.selected.size === 0) {
    return latticeFailure('EMPTY_SELECTION', 'No cells selected');
  }

  const spec = analyzeSelection(state.selected.values());
  return update(state, { status: 'finalized', spec });
}

export function cancel(state: SelectorState): SelectorState {
  if (!isActive(state)) return state;
  return update(state, { status: 'cancelled' });
}

// =============================================================================
// Actions
// =============================================================================

export type SelectorAction =
  | { readonly type: 'move'; readonly direction: Direction }
  | { readonly type: 'layer'; readonly delta: number }
  | { readonly type: 'toggle' }
  | { readonly type: 'selectAll' }
  | { readonly type: 'clear' }
  | { readonly type: 'finalize' }
  | { readonly type: 'cancel' };

/**
 * Apply one input action. A rejected finalize keeps the session active and
 * records the reason in `message`.
 */
export function applySelectorAction(state: SelectorState, action: SelectorAction): SelectorState {
  switch (action.type) {
    case 'move':
      return move(state, action.direction);
    case 'layer':
      return changeLayer(state, action.delta);
    case 'toggle':
      return toggleSelection(state);
    case 'selectAll':
      return selectAll(state);
    case 'clear':
      return clearSelection(state);
    case 'finalize': {
      const result = finalize(state);
      if ('status' in result) {
        return result;
      }
      return Object.freeze({ ...state, message: `ERROR: ${result.details ?? result.reason}` });
    }
    case 'cancel':
      return cancel(state);
  }
}

/**
 * Run a sequence of actions from a starting snapshot.
 */
export function replayActions(state: SelectorState, actions: Iterable<SelectorAction>): SelectorState {
  let current = state;
  for (const action of actions) {
    current = applySelectorAction(current, action);
  }
  return current;
}
