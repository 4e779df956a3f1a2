/**
 * Scripted wizard sessions.
 */

import { describe, it, expect } from 'vitest';
import {
  askBounds,
  askLattice,
  collectStack,
  manualLatticeEntry,
  runWizard,
  type SelectorLauncher,
  type WizardContext,
} from '../../src/cli/wizard.js';
import { DEFAULT_CONFIG } from '../../src/lib/config/config.js';
import { Single } from '../../src/lib/core/dimension.js';
import { Contiguous, Discrete, type LatticeSpec } from '../../src/lib/core/lattice-spec.js';
import { LatticeIndex } from '../../src/lib/core/position.js';
import { createBounds } from '../../src/lib/core/types.js';
import type { SelectorOptions } from '../../src/lib/selector/selector.js';
import { ScriptedPrompter } from './scripted-prompter.js';

class FakeSelector {
  readonly calls: SelectorOptions[] = [];

  constructor(private readonly result: LatticeSpec | undefined | Error) {}

  readonly launch: SelectorLauncher = async options => {
    this.calls.push(options);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  };
}

function context(answers: string[], selector = new FakeSelector(undefined)): { p: ScriptedPrompter; ctx: WizardContext } {
  const p = new ScriptedPrompter(answers);
  return { p, ctx: { prompter: p, config: DEFAULT_CONFIG, launchSelector: selector.launch } };
}

describe('TestWizardSessions', () => {
  it('test_tally_for_pin_in_bounded_lattice', async () => {
    const { p, ctx } = context([
      '1', // tally
      '101', 'y', '5',
      '50', 'y', '1', '2', '0', '9', '0', '9', '0', '0', '2', '3', '4', '0', 'y', '100',
      '1', 'n', 'n',
      '', 'y', '2.5',
      'n',
    ]);

    const result = await runWizard(ctx);

    expect(result.session.mode).toBe('tally');
    expect(result.session.targetCell).toBe(101);
    expect(result.tally).toEqual({
      tallyType: 'F4:N',
      card: 'F4:N ( 101 < 50[3 4 0] < 1 )',
      needsVolume: true,
      volumeCard: 'SD4 2.5',
    });
    expect(result.source).toBeUndefined();
    expect(result.verification).toBeUndefined();
    expect(p.remaining).toBe(0);
    expect(p.questions).toEqual([
      'Enter choice (1/2/3): ',
      'What is the specific cell ID you want to tally/source?: ',
      'Is Cell 101 inside a universe (not Universe 0)? (y/n): ',
      'What universe number is Cell 101 in?: ',
      'What cell FILLS universe 5?: ',
      'Is Cell 50 a lattice (LAT=1 or LAT=2)? (y/n): ',
      'Enter lattice type (1/2): ',
      'Enter FILL type (1/2): ',
      '  i minimum: ',
      '  i maximum: ',
      '  j minimum: ',
      '  j maximum: ',
      '  k minimum: ',
      '  k maximum: ',
      'Enter choice (1/2): ',
      '  i index or range (e.g., 5 or 0:9): ',
      '  j index or range (e.g., 5 or 0:9): ',
      '  k index or range (e.g., 0 or 0:2): ',
      'Is Cell 50 inside a universe (not Universe 0)? (y/n): ',
      'What universe number is Cell 50 in?: ',
      'What cell FILLS universe 100?: ',
      'Is Cell 1 a lattice (LAT=1 or LAT=2)? (y/n): ',
      'Is Cell 1 inside a universe (not Universe 0)? (y/n): ',
      'Enter tally type (e.g., F4:N, F7:N, F4:P) [default: F4:N]: ',
      'Do you know the volume of Cell 101 (in cm³)? (y/n): ',
      'Enter volume of Cell 101 (cm³): ',
      'Would you like to generate a verification deck snippet? (y/n): ',
    ]);
    expect(p.printed).toContain('  Level 1: Cell 50 in U=100 [LAT spec: [3 4 0]] (fills U=5)');
    expect(p.printed).toContain('SD4 2.5');
    expect(p.printed[p.printed.length - 1]).toBe('✓ Wizard complete!');
  });

  it('test_source_for_infinite_hex_lattice_with_selector', async () => {
    const selector = new FakeSelector(Discrete([new LatticeIndex(-1, 0, 0), new LatticeIndex(1, 0, 0)]));
    const { p, ctx } = context(
      [
        '2', // sdef
        '11', 'y', '3',
        '30', 'y', '2', '1', 'y', '-2', '2', '-2', '2', '0', '0', '', 'n',
        '', 'n', 'y', '14.1',
        'y',
      ],
      selector
    );

    const result = await runWizard(ctx);

    expect(selector.calls).toEqual([
      { geometry: 'hexagonal', window: createBounds([-2, 2], [-2, 2], [0, 0]), unbounded: true },
    ]);
    expect(p.suspended).toBe(1);
    expect(result.tally).toBeUndefined();
    expect(result.source).toEqual({
      sdef: 'SDEF CEL=d1 ERG=14.1',
      si: 'SI1 L (11 < 30[-1 0 0]) (11 < 30[1 0 0])',
      sp: 'SP1 1 1',
      entries: 2,
    });
    expect(p.warnings).toContain('   Generating 2 separate source locations with equal probability.');
    expect(result.verification?.[4]).toBe('SI1 L ( (11 < 30[-1 0 0]) (11 < 30[1 0 0]) )');
    expect(result.session.stack[1].isInfiniteLattice).toBe(true);
    expect(result.session.stack[1].bounds).toEqual(createBounds([-2, 2], [-2, 2], [0, 0]));
    expect(p.remaining).toBe(0);
  });

  it('test_target_in_global_universe', async () => {
    const { p, ctx } = context(['3', '7', 'n', '', '', 'n', 'n', 'n']);
    const result = await runWizard(ctx);
    expect(p.printed).toContain('✓ Cell 7 is in the global universe (U=0)');
    expect(result.tally).toEqual({ tallyType: 'F4:N', card: 'F4:N ( 7 )', needsVolume: false });
    expect(result.source?.si).toBe('SI1 L ( 7 )');
    expect(p.remaining).toBe(0);
  });

  it('test_unknown_volume_shows_template', async () => {
    const { p, ctx } = context([
      '1',
      '101', 'y', '5',
      '50', 'y', '1', '2', '0', '9', '0', '9', '0', '0', '2', '3', '4', '0', 'n',
      'f14:p', 'n',
      'n',
    ]);
    const result = await runWizard(ctx);
    expect(result.tally).toEqual({
      tallyType: 'F14:P',
      card: 'F14:P ( 101 < 50[3 4 0] )',
      needsVolume: true,
    });
    expect(p.warnings).toContain('   Format: SD14 <volume_of_cell_101_in_cm3>');
  });

  it('test_ambiguous_discrete_nodes_are_reported', async () => {
    const selector = new FakeSelector(Discrete([new LatticeIndex(0, 0, 0), new LatticeIndex(2, 0, 0)]));
    const { p, ctx } = context(
      [
        '1',
        '101', 'y', '5',
        '50', 'y', '1', '2', '0', '2', '0', '0', '0', '0', '1', '', 'y', '100',
        '60', 'y', '1', '2', '0', '2', '0', '0', '0', '0', '1', '', 'n',
        '', 'n',
        'n',
      ],
      selector
    );
    const result = await runWizard(ctx);
    expect(selector.calls).toHaveLength(2);
    expect(p.warnings).toContain('⚠ Cells 50, 60 all have non-contiguous selections; using Cell 50, ignoring Cell 60');
    expect(result.tally?.card).toBe('F4:N ( (101 < 50[0 0 0] < 60[0 0 0]) (101 < 50[2 0 0] < 60[2 0 0]) )');
  });
});

describe('TestLatticeQuestions', () => {
  it('test_size_guard_decline_falls_back_to_manual', async () => {
    const selector = new FakeSelector(undefined);
    const { p, ctx } = context(
      ['1', '2', '0', '29', '0', '29', '0', '0', '1', 'n', '5', '5', '0'],
      selector
    );
    const answers = await askLattice(ctx, 50);
    expect(answers.latticeSpec).toEqual(Contiguous(Single(5), Single(5), Single(0)));
    expect(selector.calls).toHaveLength(0);
    expect(p.warnings).toContain('WARNING: Grid is 30x30 = 900 cells per layer!');
    expect(p.questions).toContain('Continue with visual selector anyway? (y/n): ');
    expect(p.printed).toContain('Falling back to manual entry.');
  });

  it('test_cancelled_selector_falls_back_to_manual', async () => {
    const { p, ctx } = context(['1', '2', '0', '4', '0', '4', '0', '0', '1', '', '1', '2', '0']);
    const answers = await askLattice(ctx, 50);
    expect(answers).toEqual({
      isLattice: true,
      isInfiniteLattice: false,
      geometry: 'rectangular',
      bounds: createBounds([0, 4], [0, 4], [0, 0]),
      latticeSpec: Contiguous(Single(1), Single(2), Single(0)),
    });
    expect(p.printed).toContain('Visual selection cancelled. Falling back to manual entry.');
  });

  it('test_selector_error_falls_back_to_manual', async () => {
    const selector = new FakeSelector(new Error('Visual selector needs an interactive terminal'));
    const { p, ctx } = context(['2', '2', '0', '4', '0', '4', '0', '0', '1', '', '1', '2', '0'], selector);
    const answers = await askLattice(ctx, 50);
    expect(answers.geometry).toBe('hexagonal');
    expect(answers.latticeSpec).toEqual(Contiguous(Single(1), Single(2), Single(0)));
    expect(p.warnings).toContain('Error in visual selector: Visual selector needs an interactive terminal');
  });

  it('test_infinite_lattice_manual_entry', async () => {
    const { p, ctx } = context(['1', '1', 'n', '9999', '-500', '0']);
    const answers = await askLattice(ctx, 50);
    expect(answers).toEqual({
      isLattice: true,
      isInfiniteLattice: true,
      geometry: 'rectangular',
      latticeSpec: Contiguous(Single(9999), Single(-500), Single(0)),
    });
    expect(p.warnings).toEqual([]);
  });

  it('test_manual_entry_outside_bounds_warns', async () => {
    const { p } = context(['12', '4', '0']);
    const spec = await manualLatticeEntry(p, false, createBounds([0, 9], [0, 9], [0, 0]));
    expect(spec).toEqual(Contiguous(Single(12), Single(4), Single(0)));
    expect(p.warnings).toEqual(['⚠ [12 4 0] reaches outside the lattice bounds 0:9 0:9 0:0']);
  });

  it('test_bounds_reask_on_reversed_axis', async () => {
    const { p } = context(['5', '1', '1', '5', '0', '0', '0', '0']);
    expect(await askBounds(p, 'Viewing ')).toEqual(createBounds([1, 5], [0, 0], [0, 0]));
    expect(p.warnings).toEqual(['  Minimum must be <= maximum']);
    expect(p.questions[0]).toBe('  Viewing i minimum: ');
  });

  it('test_collect_stack_lists_levels', async () => {
    const { p, ctx } = context(['5', 'y', '10', '2', 'n', 'y', '100', '1', 'n', 'n']);
    const stack = await collectStack(ctx);
    expect(stack.map(node => node.cellId)).toEqual([5, 2, 1]);
    expect(p.printed.slice(-3)).toEqual([
      '  Level 0: Cell 5 in U=10',
      '  Level 1: Cell 2 in U=100 (fills U=10)',
      '  Level 2: Cell 1 in U=0 (fills U=100)',
    ]);
  });
});
