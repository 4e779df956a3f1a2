/**
 * Tests for containment path construction.
 */

import { describe, it, expect } from 'vitest';
import { Range, Single } from '../../src/lib/core/dimension.js';
import { Contiguous, Discrete, type LatticeSpec } from '../../src/lib/core/lattice-spec.js';
import { LatticeIndex } from '../../src/lib/core/position.js';
import { createNode, type ContainmentNode } from '../../src/lib/core/types.js';
import {
  buildSinglePath,
  buildSourcePaths,
  buildTallyPath,
  buildUnionPaths,
  checkDiscreteAmbiguity,
  findDiscreteNode,
  hasDiscreteLattice,
  needsVolumeCard,
} from '../../src/lib/path/path-builder.js';
import { createStack } from '../../src/lib/stack/stack.js';

const corners = [
  new LatticeIndex(0, 0, 0),
  new LatticeIndex(9, 9, 0),
  new LatticeIndex(0, 9, 0),
  new LatticeIndex(9, 0, 0),
];

function pinInLattice(spec: LatticeSpec): ContainmentNode[] {
  return [
    createNode({ cellId: 101, universe: 5 }),
    createNode({ cellId: 50, universe: 100, fillUniverse: 5, isLattice: true, latticeSpec: spec }),
    createNode({ cellId: 1, universe: 0, fillUniverse: 100 }),
  ];
}

describe('TestScenarios', () => {
  it('test_nested_universes_without_lattice', () => {
    const stack = createStack([
      createNode({ cellId: 5, universe: 10 }),
      createNode({ cellId: 2, universe: 100, fillUniverse: 10 }),
      createNode({ cellId: 1, universe: 0, fillUniverse: 100 }),
    ]);
    expect(buildTallyPath(stack)).toBe('( 5 < 2 < 1 )');
    expect(needsVolumeCard(stack)).toBe(false);
  });

  it('test_single_lattice_position', () => {
    const stack = createStack(pinInLattice(Contiguous(Single(3), Single(4), Single(0))));
    expect(buildTallyPath(stack)).toBe('( 101 < 50[3 4 0] < 1 )');
    expect(needsVolumeCard(stack)).toBe(true);
  });

  it('test_non_contiguous_selection_uses_union', () => {
    const stack = createStack(pinInLattice(Discrete(corners)));
    expect(buildTallyPath(stack)).toBe(
      '( (101 < 50[0 0 0] < 1) (101 < 50[9 9 0] < 1) (101 < 50[0 9 0] < 1) (101 < 50[9 0 0] < 1) )'
    );
  });

  it('test_lattice_range', () => {
    const stack = createStack(pinInLattice(Contiguous(Range(2, 4), Range(3, 5), Single(0))));
    expect(buildTallyPath(stack)).toBe('( 101 < 50[2:4 3:5 0] < 1 )');
  });

  it('test_multilevel_lattice', () => {
    const stack = createStack([
      createNode({ cellId: 1001, universe: 1 }),
      createNode({ cellId: 500, universe: 10, fillUniverse: 1 }),
      createNode({
        cellId: 200,
        universe: 100,
        fillUniverse: 10,
        isLattice: true,
        latticeSpec: Contiguous(Single(5), Single(5), Single(0)),
      }),
      createNode({
        cellId: 50,
        universe: 0,
        fillUniverse: 100,
        isLattice: true,
        latticeSpec: Contiguous(Single(2), Single(3), Single(0)),
      }),
    ]);
    expect(buildTallyPath(stack)).toBe('( 1001 < 500 < 200[5 5 0] < 50[2 3 0] )');
  });
});

describe('TestPathTokens', () => {
  it('test_target_alone', () => {
    const stack = createStack([createNode({ cellId: 7, universe: 0 })]);
    expect(buildTallyPath(stack)).toBe('( 7 )');
  });

  it('test_empty_stack_uses_target_cell', () => {
    expect(buildTallyPath([], 42)).toBe('( 42 )');
    expect(() => buildTallyPath([])).toThrow('stack is empty and no target cell given');
  });

  it('test_lattice_without_spec_is_bare_id', () => {
    const stack = [
      createNode({ cellId: 101, universe: 5 }),
      createNode({ cellId: 50, universe: 0, fillUniverse: 5, isLattice: true }),
    ];
    expect(buildSinglePath(stack)).toBe('101 < 50');
  });

  it('test_lattice_spec_on_target_is_used', () => {
    const stack = [
      createNode({
        cellId: 50,
        universe: 0,
        isLattice: true,
        latticeSpec: Contiguous(Range(0, 1), Single(0), Single(0)),
      }),
    ];
    expect(buildTallyPath(stack)).toBe('( 50[0:1 0 0] )');
    expect(needsVolumeCard(stack)).toBe(false);
  });

  it('test_discrete_without_override_is_bare_id', () => {
    const stack = pinInLattice(Discrete(corners));
    expect(buildSinglePath(stack)).toBe('101 < 50 < 1');
    expect(buildSinglePath(stack, new LatticeIndex(9, 9, 0))).toBe('101 < 50[9 9 0] < 1');
  });

  it('test_union_without_discrete_falls_back_to_single_path', () => {
    const stack = pinInLattice(Contiguous(Single(3), Single(4), Single(0)));
    expect(buildUnionPaths(stack)).toBe('101 < 50[3 4 0] < 1');
  });
});

describe('TestSourcePaths', () => {
  it('test_contiguous_source_is_tally_path', () => {
    const stack = pinInLattice(Contiguous(Single(3), Single(4), Single(0)));
    expect(buildSourcePaths(stack)).toEqual(['( 101 < 50[3 4 0] < 1 )']);
  });

  it('test_discrete_source_lists_each_element', () => {
    const stack = pinInLattice(Discrete(corners.slice(0, 2)));
    expect(buildSourcePaths(stack)).toEqual(['(101 < 50[0 0 0] < 1)', '(101 < 50[9 9 0] < 1)']);
  });
});

describe('TestDiscreteNodes', () => {
  const twoDiscrete = (): ContainmentNode[] => [
    createNode({ cellId: 101, universe: 5 }),
    createNode({
      cellId: 50,
      universe: 100,
      fillUniverse: 5,
      isLattice: true,
      latticeSpec: Discrete([new LatticeIndex(0, 0, 0), new LatticeIndex(2, 0, 0)]),
    }),
    createNode({
      cellId: 60,
      universe: 0,
      fillUniverse: 100,
      isLattice: true,
      latticeSpec: Discrete([new LatticeIndex(1, 1, 0), new LatticeIndex(3, 3, 0)]),
    }),
  ];

  it('test_first_discrete_node_wins', () => {
    const stack = twoDiscrete();
    expect(findDiscreteNode(stack)?.node.cellId).toBe(50);
    expect(findDiscreteNode(stack)?.level).toBe(1);
    expect(buildTallyPath(stack)).toBe('( (101 < 50[0 0 0] < 60[0 0 0]) (101 < 50[2 0 0] < 60[2 0 0]) )');
  });

  it('test_ambiguity_is_reported', () => {
    expect(checkDiscreteAmbiguity(twoDiscrete())).toEqual({
      reason: 'AMBIGUOUS_NON_CONTIGUITY',
      details: 'Cells 50, 60 all have non-contiguous selections; using Cell 50, ignoring Cell 60',
    });
  });

  it('test_single_discrete_node_is_not_ambiguous', () => {
    const stack = pinInLattice(Discrete(corners));
    expect(hasDiscreteLattice(stack)).toBe(true);
    expect(checkDiscreteAmbiguity(stack)).toBeUndefined();
  });

  it('test_no_discrete_node', () => {
    const stack = pinInLattice(Contiguous(Single(3), Single(4), Single(0)));
    expect(hasDiscreteLattice(stack)).toBe(false);
    expect(findDiscreteNode(stack)).toBeUndefined();
  });
});
