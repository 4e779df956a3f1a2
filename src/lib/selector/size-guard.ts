/**
 * Advisory size check run before opening the visual selector.
 */

import { axisSize, type LatticeBounds } from '../core/types.js';

export interface SelectorLimits {
  /** Cross-section above which the grid is unlikely to fit a terminal */
  readonly maxCellsPerLayer: number;
  /** Total volume above which navigation gets tedious */
  readonly maxTotalCells: number;
}

export const DEFAULT_SELECTOR_LIMITS: SelectorLimits = Object.freeze({
  maxCellsPerLayer: 400, // 20x20
  maxTotalCells: 2000,
});

export type SizeWarning = 'LAYER_TOO_LARGE' | 'VOLUME_TOO_LARGE';

export interface SizeCheck {
  readonly iSize: number;
  readonly jSize: number;
  readonly layers: number;
  readonly cellsPerLayer: number;
  readonly totalCells: number;
  /** Set when a limit is exceeded; the per-layer limit is reported first */
  readonly warning?: SizeWarning;
}

export function checkSelectorSize(
  window: LatticeBounds,
  limits: SelectorLimits = DEFAULT_SELECTOR_LIMITS
): SizeCheck {
  const iSize = axisSize(window.i);
  const jSize = axisSize(window.j);
  const layers = axisSize(window.k);
  const cellsPerLayer = iSize * jSize;
  const totalCells = cellsPerLayer * layers;

  const check = { iSize, jSize, layers, cellsPerLayer, totalCells };
  if (cellsPerLayer > limits.maxCellsPerLayer) {
    return Object.freeze({ ...check, warning: 'LAYER_TOO_LARGE' as const });
  }
  if (totalCells > limits.maxTotalCells) {
    return Object.freeze({ ...check, warning: 'VOLUME_TOO_LARGE' as const });
  }
  return Object.freeze(check);
}

/**
 * Warning text for a failed size check, empty when within limits.
 */
export function describeSizeWarning(check: SizeCheck): string[] {
  switch (check.warning) {
    case 'LAYER_TOO_LARGE':
      return [
        `WARNING: Grid is ${check.iSize}x${check.jSize} = ${check.cellsPerLayer} cells per layer!`,
        '   Visual selector works best with grids smaller than 20x20 (~400 cells).',
        '   Large grids may not fit in your terminal or be hard to navigate.',
      ];
    case 'VOLUME_TOO_LARGE':
      return [
        `WARNING: Total lattice has ${check.totalCells} cells across ${check.layers} layers!`,
        '   This may be slow or difficult to use.',
      ];
    case undefined:
      return [];
  }
}
