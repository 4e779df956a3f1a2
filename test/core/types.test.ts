/**
 * Tests for containment nodes, bounds and errors.
 */

import { describe, it, expect } from 'vitest';
import {
  axisSize,
  createBounds,
  createNode,
  describeNode,
  geometryFromLat,
  inAxis,
  latFromGeometry,
  withLatticeSpec,
} from '../../src/lib/core/types.js';
import { Contiguous, Discrete, Single } from '../../src/lib/index.js';
import {
  isLatticeError,
  isLatticeFailure,
  LatticeError,
  latticeFailure,
} from '../../src/lib/core/errors.js';
import { flipDirection, Direction, HEXAGONAL_DIRECTIONS } from '../../src/lib/core/direction.js';
import { LatticeIndex } from '../../src/lib/core/position.js';

describe('TestContainmentNode', () => {
  it('test_plain_node_defaults', () => {
    const node = createNode({ cellId: 5, universe: 10 });
    expect(node).toEqual({ cellId: 5, universe: 10, isLattice: false, isInfiniteLattice: false });
    expect(Object.isFrozen(node)).toBe(true);
    expect('fillUniverse' in node).toBe(false);
  });

  it('test_lattice_node_keeps_lattice_fields', () => {
    const bounds = createBounds([0, 9], [0, 9], [0, 0]);
    const spec = Contiguous(Single(3), Single(4), Single(0));
    const node = createNode({
      cellId: 50,
      universe: 100,
      fillUniverse: 5,
      isLattice: true,
      geometry: 'rectangular',
      bounds,
      latticeSpec: spec,
    });
    expect(node.fillUniverse).toBe(5);
    expect(node.geometry).toBe('rectangular');
    expect(node.bounds).toBe(bounds);
    expect(node.latticeSpec).toBe(spec);
  });

  it('test_lattice_fields_on_plain_node_fail', () => {
    expect(() =>
      createNode({
        cellId: 2,
        universe: 100,
        latticeSpec: Contiguous(Single(0), Single(0), Single(0)),
        geometry: 'hexagonal',
      })
    ).toThrow('Cell 2 is not a lattice but has: lattice spec, geometry');
  });

  it('test_non_integer_ids_fail', () => {
    try {
      createNode({ cellId: 1.5, universe: 0 });
      expect.unreachable();
    } catch (e) {
      expect(isLatticeError(e)).toBe(true);
      if (isLatticeError(e)) {
        expect(e.reason).toBe('INVALID_NODE');
        expect(e.message).toBe('Invalid cell number: 1.5');
      }
    }
  });

  it('test_ids_beyond_safe_integers_fail', () => {
    expect(() => createNode({ cellId: 2 ** 53, universe: 0 })).toThrow('Invalid cell number: 9007199254740992');
  });

  it('test_with_lattice_spec_returns_new_node', () => {
    const node = createNode({ cellId: 50, universe: 100, fillUniverse: 5, isLattice: true });
    const spec = Discrete([new LatticeIndex(0, 0, 0)]);
    const updated = withLatticeSpec(node, spec);
    expect(updated.latticeSpec).toBe(spec);
    expect(node.latticeSpec).toBeUndefined();
  });

  it('test_describe_node', () => {
    const lattice = createNode({
      cellId: 50,
      universe: 100,
      fillUniverse: 5,
      isLattice: true,
      latticeSpec: Contiguous(Single(3), Single(4), Single(0)),
    });
    expect(describeNode(lattice)).toBe('Cell 50 in U=100 [LAT spec: [3 4 0]] (fills U=5)');
    expect(describeNode(createNode({ cellId: 101, universe: 5 }))).toBe('Cell 101 in U=5');
  });
});

describe('TestBounds', () => {
  it('test_axis_helpers', () => {
    const bounds = createBounds([-5, 5], [-4, 4], [0, 2]);
    expect(axisSize(bounds.i)).toBe(11);
    expect(axisSize(bounds.k)).toBe(3);
    expect(inAxis(bounds.j, -4)).toBe(true);
    expect(inAxis(bounds.j, 5)).toBe(false);
  });

  it('test_inverted_axis_fails', () => {
    expect(() => createBounds([0, 9], [3, 1], [0, 0])).toThrow('Invalid bounds on axis j: 3:1');
  });

  it('test_lat_numbers', () => {
    expect(geometryFromLat(1)).toBe('rectangular');
    expect(geometryFromLat(2)).toBe('hexagonal');
    expect(geometryFromLat(3)).toBeUndefined();
    expect(latFromGeometry('hexagonal')).toBe(2);
  });
});

describe('TestErrors', () => {
  it('test_failure_values', () => {
    const failure = latticeFailure('EMPTY_SELECTION', 'No cells selected');
    expect(isLatticeFailure(failure)).toBe(true);
    expect(isLatticeFailure(new LatticeError('INVALID_RANGE', 'x'))).toBe(false);
    expect(isLatticeFailure(null)).toBe(false);
    expect(latticeFailure('INVALID_STACK')).toEqual({ reason: 'INVALID_STACK' });
  });

  it('test_error_to_failure', () => {
    const error = new LatticeError('INVALID_RANGE', 'Invalid range 5:2');
    expect(error.name).toBe('LatticeError');
    expect(error.toFailure()).toEqual({ reason: 'INVALID_RANGE', details: 'Invalid range 5:2' });
  });
});

describe('TestDirection', () => {
  it('test_flip_is_an_involution', () => {
    for (const direction of Object.values(Direction)) {
      expect(flipDirection(flipDirection(direction))).toBe(direction);
    }
    expect(flipDirection(Direction.NE)).toBe(Direction.SW);
  });

  it('test_hexagonal_directions', () => {
    expect(HEXAGONAL_DIRECTIONS).toHaveLength(6);
    expect(HEXAGONAL_DIRECTIONS).not.toContain(Direction.N);
  });
});
