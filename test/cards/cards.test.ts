/**
 * Tests for tally, segment divisor and source cards.
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeTallyType,
  sourceDefinition,
  tallyCard,
  tallyNumber,
  verificationDeck,
  volumeCard,
  volumeCardTemplate,
} from '../../src/lib/cards/cards.js';
import { Single } from '../../src/lib/core/dimension.js';
import { Contiguous, Discrete, type LatticeSpec } from '../../src/lib/core/lattice-spec.js';
import { LatticeIndex } from '../../src/lib/core/position.js';
import { createNode, type ContainmentNode } from '../../src/lib/core/types.js';

function pinInLattice(spec: LatticeSpec): ContainmentNode[] {
  return [
    createNode({ cellId: 101, universe: 5 }),
    createNode({ cellId: 50, universe: 100, fillUniverse: 5, isLattice: true, latticeSpec: spec }),
    createNode({ cellId: 1, universe: 0, fillUniverse: 100 }),
  ];
}

const pin = Contiguous(Single(3), Single(4), Single(0));
const twoPins = Discrete([new LatticeIndex(0, 0, 0), new LatticeIndex(9, 9, 0)]);

describe('TestTallyCards', () => {
  it('test_tally_type_is_normalized', () => {
    expect(normalizeTallyType(' f4:n ')).toBe('F4:N');
  });

  it('test_tally_number', () => {
    expect(tallyNumber('F4:N')).toBe(4);
    expect(tallyNumber('f14:p')).toBe(14);
    expect(tallyNumber('*F8:E')).toBe(8);
    expect(tallyNumber('TALLY')).toBeUndefined();
  });

  it('test_tally_card', () => {
    expect(tallyCard('f4:n', '( 101 < 50[3 4 0] < 1 )')).toBe('F4:N ( 101 < 50[3 4 0] < 1 )');
  });

  it('test_volume_card', () => {
    expect(volumeCard('F4:N', 2.75)).toBe('SD4 2.75');
    expect(volumeCard('F14:P', 10)).toBe('SD14 10');
    expect(volumeCard('X', 10)).toBeUndefined();
  });

  it('test_volume_card_template', () => {
    expect(volumeCardTemplate('F4:N', 101)).toBe('SD4 <volume_of_cell_101_in_cm3>');
    expect(volumeCardTemplate('X', 101)).toBe('SD<n> <volume_of_cell_101_in_cm3>');
  });
});

describe('TestSourceDefinition', () => {
  it('test_single_location', () => {
    const cards = sourceDefinition(pinInLattice(pin), { distribution: 1 });
    expect(cards).toEqual({
      sdef: 'SDEF CEL=d1',
      si: 'SI1 L ( 101 < 50[3 4 0] < 1 )',
      sp: 'SP1 1',
      entries: 1,
    });
  });

  it('test_position_and_energy', () => {
    const cards = sourceDefinition(pinInLattice(pin), {
      distribution: 2,
      position: [0, 0, 1.5],
      energy: 14.1,
    });
    expect(cards.sdef).toBe('SDEF CEL=d2 POS=0 0 1.5 ERG=14.1');
    expect(cards.si).toBe('SI2 L ( 101 < 50[3 4 0] < 1 )');
    expect(cards.sp).toBe('SP2 1');
  });

  it('test_zero_energy_is_kept', () => {
    expect(sourceDefinition(pinInLattice(pin), { distribution: 1, energy: 0 }).sdef).toBe('SDEF CEL=d1 ERG=0');
  });

  it('test_discrete_selection_has_equal_weights', () => {
    const cards = sourceDefinition(pinInLattice(twoPins), { distribution: 3 });
    expect(cards.si).toBe('SI3 L (101 < 50[0 0 0] < 1) (101 < 50[9 9 0] < 1)');
    expect(cards.sp).toBe('SP3 1 1');
    expect(cards.entries).toBe(2);
  });

  it('test_empty_stack_uses_target_cell', () => {
    const cards = sourceDefinition([], { distribution: 1 }, 7);
    expect(cards.si).toBe('SI1 L ( 7 )');
    expect(cards.sp).toBe('SP1 1');
  });
});

describe('TestVerificationDeck', () => {
  it('test_deck_lines', () => {
    expect(verificationDeck(pinInLattice(pin))).toEqual([
      'C --- Paste this into an MCNP input for verification ---',
      'C --- Run with 50 particles and check PRINT 110 output ---',
      '',
      'SDEF CEL=d1 ERG=1.0',
      'SI1 L ( 101 < 50[3 4 0] < 1 )',
      'SP1 1',
      'C',
      'NPS 50',
      'PRINT 110',
      'C',
      'C Set all materials to VOID for testing:',
      'C M0   $ Void',
    ]);
  });

  it('test_deck_uses_union_for_discrete_selection', () => {
    expect(verificationDeck(pinInLattice(twoPins))[4]).toBe(
      'SI1 L ( (101 < 50[0 0 0] < 1) (101 < 50[9 9 0] < 1) )'
    );
  });
});
