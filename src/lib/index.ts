/**
 * latpath: containment paths for tallies and sources in nested universes and lattices.
 */

export {
  LatticeError,
  latticeFailure,
  isLatticeError,
  isLatticeFailure,
} from './core/errors.js';
export type { LatticeErrorReason, LatticeFailure } from './core/errors.js';

export {
  Single,
  Range,
  spanOf,
  isSingle,
  isRange,
  formatDimension,
  dimensionSize,
  dimensionBounds,
} from './core/dimension.js';
export type { Dimension } from './core/dimension.js';

export { LatticeIndex, compareIndices } from './core/position.js';
export { Direction, flipDirection, RECTANGULAR_DIRECTIONS, HEXAGONAL_DIRECTIONS } from './core/direction.js';

export {
  Contiguous,
  Discrete,
  isContiguous,
  isDiscrete,
  toRangeToken,
  toSingleToken,
  describeSpec,
  elementCount,
  singleElement,
  isSingleElement,
  enumerateElements,
} from './core/lattice-spec.js';
export type { LatticeSpec, ContiguousSpec, DiscreteSpec } from './core/lattice-spec.js';

export {
  createNode,
  withLatticeSpec,
  describeNode,
  createBounds,
  axisSize,
  inAxis,
  geometryFromLat,
  latFromGeometry,
} from './core/types.js';
export type { ContainmentNode, NodeInit, GeometryKind, AxisRange, LatticeBounds } from './core/types.js';

export {
  validateStack,
  createStack,
  startStack,
  climbStack,
  isDraftComplete,
  completeStack,
  targetCellOf,
} from './stack/stack.js';
export type { ContainmentStack, StackDraft, ValidationResult, StackValidationError } from './stack/stack.js';

export {
  buildSinglePath,
  buildUnionPaths,
  buildTallyPath,
  buildSourcePaths,
  needsVolumeCard,
  findDiscreteNode,
  findDiscreteNodes,
  hasDiscreteLattice,
  checkDiscreteAmbiguity,
} from './path/path-builder.js';
export type { DiscreteNode } from './path/path-builder.js';

export {
  normalizeTallyType,
  tallyNumber,
  tallyCard,
  volumeCard,
  volumeCardTemplate,
  sourceDefinition,
  verificationDeck,
} from './cards/cards.js';
export type { SourceOptions, SourceCards } from './cards/cards.js';

export * from './selector/index.js';

export { renderSelector, renderScreenLines, RECT_GLYPHS, HEX_GLYPHS } from './renderer/text-grid.js';
export type { Viewport, RenderedScreen, Glyphs } from './renderer/text-grid.js';

export { parseDimension, parseIndexSpec } from './parser/dimension-parser.js';
export {
  parseStackDefinition,
  stackFromDefinition,
  exportStackDefinition,
  formatStackDefinition,
} from './parser/stack-parser.js';
export type { StackDefinition, NodeDefinition, LatticeDefinition, ParsedStack } from './parser/stack-parser.js';

export { DEFAULT_CONFIG, parseConfig, configFromObject } from './config/config.js';
export type { ToolConfig } from './config/config.js';
