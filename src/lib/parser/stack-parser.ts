/**
 * Read and write containment stacks as JSON5 definitions.
 *
 * Format (nodes innermost first):
 *
 *     {
 *       nodes: [
 *         { cell: 101, universe: 5 },
 *         {
 *           cell: 50, universe: 100, fill: 5,
 *           lattice: { geometry: 'rectangular', bounds: '0:9 0:9 0:0', index: '3 4 0' },
 *         },
 *         { cell: 1, universe: 0, fill: 100 },
 *       ],
 *     }
 *
 * A lattice entry takes either `index` (three space-separated axes, each `n`
 * or `min:max`) or `elements` (a list of `[i, j, k]` positions).
 */

import JSON5 from 'json5';
import { dimensionBounds, formatDimension } from '../core/dimension.js';
import { isLatticeError, LatticeError } from '../core/errors.js';
import { Discrete, type LatticeSpec } from '../core/lattice-spec.js';
import { LatticeIndex } from '../core/position.js';
import {
  createBounds,
  createNode,
  geometryFromLat,
  type ContainmentNode,
  type GeometryKind,
  type LatticeBounds,
  type NodeInit,
} from '../core/types.js';
import { createStack, type ContainmentStack } from '../stack/stack.js';
import { parseIndexSpec } from './dimension-parser.js';

/**
 * Plain-object form of one node, as written in a definition file.
 */
export interface NodeDefinition {
  cell: number;
  universe: number;
  fill?: number;
  lattice?: LatticeDefinition;
}

export interface LatticeDefinition {
  geometry?: GeometryKind;
  infinite?: boolean;
  bounds?: string;
  index?: string;
  elements?: Array<[number, number, number]>;
}

export interface StackDefinition {
  target?: number;
  nodes: NodeDefinition[];
}

export interface ParsedStack {
  readonly stack: ContainmentStack;
  readonly targetCell: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(message: string, where: string): never {
  throw new LatticeError('INVALID_STACK', `${message}\n  At: ${where}`);
}

function readInteger(record: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    fail(`'${key}' must be an integer, got ${JSON.stringify(value)}`, where);
  }
  return value;
}

function readGeometry(value: unknown, where: string): GeometryKind | undefined {
  if (value === undefined) return undefined;
  if (value === 'rectangular' || value === 'hexagonal') return value;
  if (typeof value === 'number') {
    const geometry = geometryFromLat(value);
    if (geometry) return geometry;
  }
  return fail(
    `'geometry' must be 'rectangular', 'hexagonal', 1 or 2, got ${JSON.stringify(value)}`,
    where
  );
}

function readBounds(value: unknown, where: string): LatticeBounds | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    fail(`'bounds' must be a string like '0:9 0:9 0:2'`, where);
  }
  const spec = parseIndexSpec(value);
  return createBounds(dimensionBounds(spec.i), dimensionBounds(spec.j), dimensionBounds(spec.k));
}

function readElements(value: unknown, where: string): LatticeSpec {
  if (!Array.isArray(value)) {
    return fail(`'elements' must be a list of [i, j, k] positions`, where);
  }
  const elements = value.map((entry: unknown, n) => {
    if (
      !Array.isArray(entry) ||
      entry.length !== 3 ||
      !entry.every((v: unknown) => typeof v === 'number' && Number.isSafeInteger(v))
    ) {
      return fail(`Element ${n} must be [i, j, k] integers, got ${JSON.stringify(entry)}`, where);
    }
    const [i, j, k] = entry.map((v: unknown) => Number(v));
    return new LatticeIndex(i, j, k);
  });
  return Discrete(elements);
}

function readLattice(value: unknown, where: string): Omit<NodeInit, 'cellId' | 'universe'> {
  if (value === undefined) {
    return {};
  }
  if (value === true) {
    return { isLattice: true };
  }
  if (!isRecord(value)) {
    return fail(`'lattice' must be an object`, where);
  }

  if (value.index !== undefined && value.elements !== undefined) {
    fail(`'lattice' takes either 'index' or 'elements', not both`, where);
  }
  if (value.infinite !== undefined && typeof value.infinite !== 'boolean') {
    fail(`'infinite' must be true or false`, where);
  }
  if (value.index !== undefined && typeof value.index !== 'string') {
    fail(`'index' must be a string like '3 4 0' or '0:9 0:9 0'`, where);
  }

  let latticeSpec: LatticeSpec | undefined;
  if (typeof value.index === 'string') {
    latticeSpec = parseIndexSpec(value.index);
  } else if (value.elements !== undefined) {
    latticeSpec = readElements(value.elements, where);
  }

  return {
    isLattice: true,
    isInfiniteLattice: value.infinite === true,
    latticeSpec,
    geometry: readGeometry(value.geometry, where),
    bounds: readBounds(value.bounds, where),
  };
}

function readNode(value: unknown, level: number): ContainmentNode {
  const where = `nodes[${level}]`;
  if (!isRecord(value)) {
    return fail(`Node must be an object`, where);
  }

  const cellId = readInteger(value, 'cell', where);
  const universe = readInteger(value, 'universe', where);
  if (cellId === undefined) fail(`Missing 'cell'`, where);
  if (universe === undefined) fail(`Missing 'universe'`, where);

  try {
    return createNode({
      cellId,
      universe,
      fillUniverse: readInteger(value, 'fill', where),
      ...readLattice(value.lattice, where),
    });
  } catch (error) {
    if (isLatticeError(error) && !error.message.includes('\n  At: ')) {
      throw new LatticeError(error.reason, `${error.message}\n  At: ${where}`);
    }
    throw error;
  }
}

/**
 * Build a stack from an already-parsed definition object.
 *
 * @throws LatticeError with the offending node path in the message
 */
export function stackFromDefinition(definition: unknown): ParsedStack {
  if (!isRecord(definition) || !Array.isArray(definition.nodes)) {
    return fail(`Expected an object with a 'nodes' list`, 'root');
  }

  const nodes = definition.nodes.map((node: unknown, level) => readNode(node, level));
  const stack = createStack(nodes);

  const target = readInteger(definition, 'target', 'root');
  if (target !== undefined && target !== stack[0].cellId) {
    fail(`'target' is ${target} but the innermost node is Cell ${stack[0].cellId}`, 'root');
  }

  return Object.freeze({ stack, targetCell: stack[0].cellId });
}

/**
 * Parse a JSON5 stack definition (unquoted keys, trailing commas and comments allowed).
 *
 * @throws LatticeError (INVALID_STACK) for syntax errors or invalid content
 */
export function parseStackDefinition(text: string): ParsedStack {
  let definition: unknown;
  try {
    definition = JSON5.parse(text);
  } catch (e) {
    throw new LatticeError('INVALID_STACK', `Invalid JSON5: ${e instanceof Error ? e.message : String(e)}`);
  }
  return stackFromDefinition(definition);
}

function formatBounds(bounds: LatticeBounds): string {
  return [bounds.i, bounds.j, bounds.k].map(axis => `${axis.min}:${axis.max}`).join(' ');
}

function exportLattice(node: ContainmentNode): LatticeDefinition {
  const lattice: LatticeDefinition = {};
  if (node.geometry) lattice.geometry = node.geometry;
  if (node.isInfiniteLattice) lattice.infinite = true;
  if (node.bounds) lattice.bounds = formatBounds(node.bounds);

  const spec = node.latticeSpec;
  if (spec?.type === 'contiguous') {
    lattice.index = [spec.i, spec.j, spec.k].map(formatDimension).join(' ');
  } else if (spec?.type === 'discrete') {
    lattice.elements = spec.elements.map((e): [number, number, number] => [e.i, e.j, e.k]);
  }
  return lattice;
}

/**
 * Export a stack to the definition format (inverse of stackFromDefinition).
 */
export function exportStackDefinition(stack: ContainmentStack): StackDefinition {
  return {
    target: stack[0].cellId,
    nodes: stack.map(node => {
      const definition: NodeDefinition = { cell: node.cellId, universe: node.universe };
      if (node.fillUniverse !== undefined) definition.fill = node.fillUniverse;
      if (node.isLattice) definition.lattice = exportLattice(node);
      return definition;
    }),
  };
}

/**
 * Export a stack as JSON5 text.
 */
export function formatStackDefinition(stack: ContainmentStack): string {
  return JSON5.stringify(exportStackDefinition(stack), null, 2);
}
