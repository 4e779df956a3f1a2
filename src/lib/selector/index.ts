/**
 * Interactive lattice position selection.
 */

export {
  createSelector,
  move,
  changeLayer,
  toggleSelection,
  selectAll,
  clearSelection,
  finalize,
  cancel,
  applySelectorAction,
  replayActions,
  cursorIndex,
  isSelected,
  isActive,
} from './selector.js';
export type { SelectorState, SelectorStatus, SelectorOptions, SelectorAction } from './selector.js';
export { analyzeSelection, boundingBox, boxVolume, isContiguousSelection } from './contiguity.js';
export type { SelectionBox } from './contiguity.js';
export { hexNeighbor, rectNeighbor, neighbor, isOddRow } from './neighbors.js';
export { checkSelectorSize, describeSizeWarning, DEFAULT_SELECTOR_LIMITS } from './size-guard.js';
export type { SelectorLimits, SizeCheck, SizeWarning } from './size-guard.js';
