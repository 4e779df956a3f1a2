/**
 * Interactive wizard: build a containment stack bottom-up, then generate
 * tally, source and verification cards for it.
 */

import {
  normalizeTallyType,
  sourceDefinition,
  tallyCard,
  tallyNumber,
  verificationDeck,
  volumeCard,
  volumeCardTemplate,
  type SourceCards,
} from '../lib/cards/cards.js';
import type { ToolConfig } from '../lib/config/config.js';
import { dimensionBounds } from '../lib/core/dimension.js';
import { Contiguous, describeSpec, type ContiguousSpec, type LatticeSpec } from '../lib/core/lattice-spec.js';
import {
  createBounds,
  createNode,
  describeNode,
  type AxisRange,
  type ContainmentNode,
  type GeometryKind,
  type LatticeBounds,
  type NodeInit,
} from '../lib/core/types.js';
import {
  buildTallyPath,
  checkDiscreteAmbiguity,
  hasDiscreteLattice,
  needsVolumeCard,
} from '../lib/path/path-builder.js';
import type { SelectorOptions } from '../lib/selector/selector.js';
import { checkSelectorSize, describeSizeWarning } from '../lib/selector/size-guard.js';
import {
  climbStack,
  completeStack,
  isDraftComplete,
  startStack,
  type ContainmentStack,
} from '../lib/stack/stack.js';
import { askChoice, askDimension, askFloat, askInt, askYesNo } from './dialogue.js';
import type { Prompter } from './prompter.js';

const RULE = '='.repeat(70);
const DASH = '-'.repeat(70);

export type WizardMode = 'tally' | 'sdef' | 'both';

/**
 * Everything the output stages need, passed explicitly from stage to stage.
 */
export interface WizardSession {
  readonly mode: WizardMode;
  readonly stack: ContainmentStack;
  readonly targetCell: number;
}

/**
 * Opens the visual selector. Resolves to undefined when the operator cancels.
 */
export type SelectorLauncher = (options: SelectorOptions) => Promise<LatticeSpec | undefined>;

export interface WizardContext {
  readonly prompter: Prompter;
  readonly config: ToolConfig;
  readonly launchSelector: SelectorLauncher;
}

export interface TallyOutput {
  readonly tallyType: string;
  readonly card: string;
  readonly needsVolume: boolean;
  /** SD card, when the operator supplied the volume */
  readonly volumeCard?: string;
}

export interface WizardResult {
  readonly session: WizardSession;
  readonly tally?: TallyOutput;
  readonly source?: SourceCards;
  readonly verification?: ReadonlyArray<string>;
}

type LatticeAnswers = Pick<NodeInit, 'isLattice' | 'isInfiniteLattice' | 'latticeSpec' | 'geometry' | 'bounds'>;

function banner(p: Prompter, title: string): void {
  p.print('', RULE, title, RULE);
}

function formatBounds(bounds: LatticeBounds): string {
  return [bounds.i, bounds.j, bounds.k].map(axis => `${axis.min}:${axis.max}`).join(' ');
}

// =============================================================================
// Stack collection
// =============================================================================

export async function chooseMode({ prompter: p }: WizardContext): Promise<WizardMode> {
  p.print(
    'What do you need to generate?',
    '  1. Tally specification (F4, F7, etc.)',
    '  2. Source definition (SDEF)',
    '  3. Both'
  );
  return askChoice<WizardMode>(p, 'Enter choice', ['tally', 'sdef', 'both']);
}

async function askAxis(p: Prompter, label: string): Promise<[number, number]> {
  for (;;) {
    const min = await askInt(p, `  ${label} minimum`);
    const max = await askInt(p, `  ${label} maximum`);
    if (min <= max) {
      return [min, max];
    }
    p.warn('  Minimum must be <= maximum');
  }
}

/**
 * Ask min/max for each axis. `prefix` labels the questions, e.g. `Viewing `.
 */
export async function askBounds(p: Prompter, prefix = ''): Promise<LatticeBounds> {
  const i = await askAxis(p, `${prefix}i`);
  const j = await askAxis(p, `${prefix}j`);
  const k = await askAxis(p, `${prefix}k`);
  return createBounds(i, j, k);
}

function outsideAxis(range: AxisRange, [min, max]: readonly [number, number]): boolean {
  return min < range.min || max > range.max;
}

/**
 * Type the lattice positions as three axes.
 */
export async function manualLatticeEntry(
  p: Prompter,
  infinite: boolean,
  bounds?: LatticeBounds
): Promise<ContiguousSpec> {
  p.print('', 'Manual lattice element specification:');
  if (infinite) {
    p.print(
      '⚠ Note: This is an INFINITE lattice (simple fill).',
      '   You can enter ANY indices (positive, negative, or zero).'
    );
  }
  p.print('For each dimension, enter either:', '  - A single index (e.g., 5)', "  - A range as 'min:max' (e.g., 0:9)", '');

  const i = await askDimension(p, '  i index or range (e.g., 5 or 0:9)');
  const j = await askDimension(p, '  j index or range (e.g., 5 or 0:9)');
  const k = await askDimension(p, '  k index or range (e.g., 0 or 0:2)');
  const spec = Contiguous(i, j, k);

  if (
    bounds &&
    (outsideAxis(bounds.i, dimensionBounds(i)) ||
      outsideAxis(bounds.j, dimensionBounds(j)) ||
      outsideAxis(bounds.k, dimensionBounds(k)))
  ) {
    p.warn(`⚠ ${describeSpec(spec)} reaches outside the lattice bounds ${formatBounds(bounds)}`);
  }
  return spec;
}

/**
 * Run the size guard, then the visual selector.
 *
 * @returns The selection, or undefined if the operator declined or cancelled,
 *          or the selector failed
 */
export async function selectVisually(ctx: WizardContext, options: SelectorOptions): Promise<LatticeSpec | undefined> {
  const p = ctx.prompter;

  const check = checkSelectorSize(options.window, ctx.config.selector);
  if (check.warning) {
    p.warn('', ...describeSizeWarning(check));
    if (!(await askYesNo(p, 'Continue with visual selector anyway?'))) {
      p.print('Falling back to manual entry.');
      return undefined;
    }
  }

  p.print('', 'Launching visual lattice selector...');
  if (options.unbounded) {
    p.print('(Viewing window mode - lattice is actually infinite)');
  }
  p.print('(Terminal will switch to interactive mode)');
  await p.ask('Press Enter to continue...');

  let spec: LatticeSpec | undefined;
  try {
    spec = await p.suspend(() => ctx.launchSelector(options));
  } catch (error) {
    p.warn('', `Error in visual selector: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!spec) {
    p.print('Visual selection cancelled. Falling back to manual entry.');
  }
  return spec;
}

/**
 * Questions for a lattice cell: geometry, fill type, bounds or viewing
 * window, and which positions to address.
 */
export async function askLattice(ctx: WizardContext, cellId: number): Promise<LatticeAnswers> {
  const p = ctx.prompter;
  p.print('', `[LATTICE SPECIFICATION for Cell ${cellId}]`, '', 'Lattice type:', '  1 = Rectangular (LAT=1)', '  2 = Hexagonal (LAT=2)');
  const geometry = await askChoice<GeometryKind>(p, 'Enter lattice type', ['rectangular', 'hexagonal']);

  p.print(
    '',
    'FILL card type:',
    '  1 = Simple fill (FILL=N) - lattice extends infinitely',
    '  2 = Fully specified (FILL= i_min:i_max j_min:j_max k_min:k_max ...) - bounded',
    '',
    'Check your MCNP input:',
    "  Simple example: '50 1 -1.0 -1 LAT=2 FILL=5 U=100'",
    "  Bounded example: '50 1 -1.0 -1 LAT=2 FILL= -5:5 -4:4 0:2 10 999r U=100'"
  );
  const infinite = await askChoice(p, 'Enter FILL type', [true, false]);

  if (infinite) {
    p.print(
      '',
      '⚠ INFINITE LATTICE detected (simple fill).',
      '   Your lattice extends infinitely - you can reference ANY indices!',
      '   Example: [0 0 0], [9999 -500 0], etc.'
    );
    if (!(await askYesNo(p, 'Use visual selector? (requires defining a viewing window)'))) {
      const latticeSpec = await manualLatticeEntry(p, true);
      return { isLattice: true, isInfiniteLattice: true, geometry, latticeSpec };
    }

    p.print(
      '',
      '[VIEWING WINDOW for Visual Selector]',
      'These are NOT actual lattice bounds (lattice is infinite).',
      'Just specify what range you want to SEE in the visual selector.',
      'Recommended: Keep small (<20x20) for usable display.'
    );
    const window = await askBounds(p, 'Viewing ');
    const latticeSpec =
      (await selectVisually(ctx, { geometry, window, unbounded: true })) ?? (await manualLatticeEntry(p, true));
    return { isLattice: true, isInfiniteLattice: true, geometry, bounds: window, latticeSpec };
  }

  p.print('', 'Lattice dimensions (from your FILL card):', 'Example: If FILL card says -5:5 -4:4 0:2, enter those values');
  const bounds = await askBounds(p);

  p.print(
    '',
    'How would you like to specify which lattice elements to tally?',
    '  1 = Visual selector (interactive grid)',
    '  2 = Manual entry (type indices/ranges)'
  );
  const visual = await askChoice(p, 'Enter choice', [true, false]);
  const selected = visual ? await selectVisually(ctx, { geometry, window: bounds }) : undefined;
  const latticeSpec = selected ?? (await manualLatticeEntry(p, false, bounds));
  return { isLattice: true, isInfiniteLattice: false, geometry, bounds, latticeSpec };
}

async function askUniverse(p: Prompter, cellId: number): Promise<number> {
  if (!(await askYesNo(p, `Is Cell ${cellId} inside a universe (not Universe 0)?`))) {
    return 0;
  }
  return askInt(p, `What universe number is Cell ${cellId} in?`, { min: 1 });
}

async function askParent(ctx: WizardContext, openUniverse: number): Promise<ContainmentNode> {
  const p = ctx.prompter;
  p.print('', `[PARENT CELL for U=${openUniverse}]`);
  const cellId = await askInt(p, `What cell FILLS universe ${openUniverse}?`, { min: 1 });

  const lattice = (await askYesNo(p, `Is Cell ${cellId} a lattice (LAT=1 or LAT=2)?`))
    ? await askLattice(ctx, cellId)
    : {};

  const universe = await askUniverse(p, cellId);
  return createNode({ cellId, universe, fillUniverse: openUniverse, ...lattice });
}

/**
 * Build the stack from the target cell outwards until a cell sits in the
 * global universe.
 */
export async function collectStack(ctx: WizardContext): Promise<ContainmentStack> {
  const p = ctx.prompter;
  banner(p, 'Building Universe Stack (Bottom-Up)');

  p.print('', '[TARGET CELL]');
  const targetCell = await askInt(p, 'What is the specific cell ID you want to tally/source?', { min: 1 });
  let draft = startStack(createNode({ cellId: targetCell, universe: await askUniverse(p, targetCell) }));

  if (isDraftComplete(draft)) {
    p.print(`✓ Cell ${targetCell} is in the global universe (U=0)`);
  }
  while (!isDraftComplete(draft)) {
    draft = climbStack(draft, await askParent(ctx, draft.openUniverse));
  }

  const stack = completeStack(draft);
  banner(p, 'Universe Stack Complete:');
  p.print(...stack.map((node, level) => `  Level ${level}: ${describeNode(node)}`));
  return stack;
}

// =============================================================================
// Output stages
// =============================================================================

async function askTallyType(ctx: WizardContext): Promise<string> {
  const p = ctx.prompter;
  const fallback = ctx.config.tally.defaultType;
  for (;;) {
    const answer = (await p.ask(`Enter tally type (e.g., F4:N, F7:N, F4:P) [default: ${fallback}]: `)).trim();
    const tallyType = normalizeTallyType(answer === '' ? fallback : answer);
    if (tallyNumber(tallyType) !== undefined) {
      return tallyType;
    }
    p.warn(`Invalid tally type '${tallyType}'. Expected a form like F4:N.`);
  }
}

async function askVolume(p: Prompter, cellId: number): Promise<number> {
  for (;;) {
    const volume = await askFloat(p, `Enter volume of Cell ${cellId} (cm³)`);
    if (volume > 0) return volume;
    p.warn('Volume must be greater than zero.');
  }
}

export async function tallyStage(ctx: WizardContext, session: WizardSession): Promise<TallyOutput> {
  const p = ctx.prompter;
  const { stack, targetCell } = session;
  banner(p, 'TALLY SPECIFICATION');

  const tallyType = await askTallyType(ctx);
  const card = tallyCard(tallyType, buildTallyPath(stack, targetCell));
  p.print('', DASH, 'GENERATED TALLY CARD:', DASH, card, DASH);

  if (!needsVolumeCard(stack)) {
    return { tallyType, card, needsVolume: false };
  }

  p.warn(
    '',
    '⚠ WARNING: This tally requires a Segment Divisor (SD) card!',
    `   Target Cell ${targetCell} is inside a lattice.`,
    '   MCNP cannot auto-calculate volumes for lattice elements.',
    `   You must specify the volume of Cell ${targetCell} in cm³.`
  );

  if (await askYesNo(p, `Do you know the volume of Cell ${targetCell} (in cm³)?`)) {
    const volume = await askVolume(p, targetCell);
    const sd = volumeCard(tallyType, volume);
    if (sd) {
      p.print(
        '',
        DASH,
        'REQUIRED SD CARD:',
        DASH,
        sd,
        DASH,
        '',
        `This specifies that Cell ${targetCell} has a volume of ${volume} cm³`,
        'in each lattice element where it appears.'
      );
      return { tallyType, card, needsVolume: true, volumeCard: sd };
    }
  }

  p.warn(
    '',
    '⚠ You MUST add an SD card manually with the correct volume!',
    `   Format: ${volumeCardTemplate(tallyType, targetCell)}`,
    `   Example: SD${tallyNumber(tallyType) ?? 4} 2.75  $ Volume of Cell ${targetCell} in cm³`
  );
  return { tallyType, card, needsVolume: true };
}

export async function sourceStage(ctx: WizardContext, session: WizardSession): Promise<SourceCards> {
  const p = ctx.prompter;
  const { stack, targetCell } = session;
  banner(p, 'SOURCE DEFINITION (SDEF) SPECIFICATION');
  p.print('', 'Using the distribution method (SI/SP cards)...');

  const distribution = await askInt(p, 'Enter distribution number to use (e.g., 1 for d1)', {
    defaultValue: ctx.config.source.defaultDistribution,
    min: 1,
  });

  let position: [number, number, number] | undefined;
  if (await askYesNo(p, 'Do you want to specify a position (POS)?')) {
    p.print('', "⚠ NOTE: You must specify coordinates in the TARGET cell's local frame.");
    position = [await askFloat(p, '  X coordinate'), await askFloat(p, '  Y coordinate'), await askFloat(p, '  Z coordinate')];
  }

  let energy: number | undefined;
  if (await askYesNo(p, 'Do you want to specify energy (ERG)?')) {
    energy = await askFloat(p, '  Energy (MeV)');
  }

  const cards = sourceDefinition(stack, { distribution, position, energy }, targetCell);
  if (hasDiscreteLattice(stack)) {
    p.warn(
      '',
      '⚠ NON-CONTIGUOUS selection detected!',
      `   Generating ${cards.entries} separate source locations with equal probability.`
    );
  }

  p.print('', DASH, 'GENERATED SOURCE DEFINITION:', DASH, cards.sdef, cards.si, cards.sp, DASH);
  return cards;
}

export async function verificationStage(
  ctx: WizardContext,
  session: WizardSession
): Promise<ReadonlyArray<string> | undefined> {
  const p = ctx.prompter;
  banner(p, 'VERIFICATION');

  let deck: string[] | undefined;
  if (await askYesNo(p, 'Would you like to generate a verification deck snippet?')) {
    deck = verificationDeck(session.stack, session.targetCell);
    p.print(
      '',
      DASH,
      'VERIFICATION DECK SNIPPET',
      DASH,
      ...deck,
      DASH,
      '',
      '✓ Instructions:',
      '  1. Add this to a copy of your input deck',
      '  2. Set all materials to void (M0 or remove material cards)',
      '  3. Run MCNP',
      "  4. Check output file for 'source particle' lines",
      '  5. Verify particles start in the correct cell/lattice position',
      "  6. If particles are 'lost' or in Cell 0, check your specification"
    );
  }

  p.print('', '✓ Wizard complete!');
  return deck;
}

// =============================================================================
// Session
// =============================================================================

export async function runWizard(ctx: WizardContext): Promise<WizardResult> {
  const p = ctx.prompter;
  p.print(
    RULE,
    'Universe & Lattice Path Wizard',
    RULE,
    '',
    'Builds the universe paths used by tally cards (F-cards)',
    'and source definitions (SDEF).',
    ''
  );

  const mode = await chooseMode(ctx);
  const stack = await collectStack(ctx);
  const session: WizardSession = { mode, stack, targetCell: stack[0].cellId };

  const ambiguity = checkDiscreteAmbiguity(stack);
  if (ambiguity) {
    p.warn(`⚠ ${ambiguity.details ?? ambiguity.reason}`);
  }

  const tally = mode === 'sdef' ? undefined : await tallyStage(ctx, session);
  const source = mode === 'tally' ? undefined : await sourceStage(ctx, session);
  const verification = await verificationStage(ctx, session);

  return { session, tally, source, verification };
}
