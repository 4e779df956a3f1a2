/**
 * Input card fragments built around containment paths.
 */

import type { ContainmentNode } from '../core/types.js';
import { buildSourcePaths, buildTallyPath } from '../path/path-builder.js';

/**
 * Normalize a tally type as typed by the operator (`f4:n` -> `F4:N`).
 */
export function normalizeTallyType(tallyType: string): string {
  return tallyType.trim().toUpperCase();
}

/**
 * Tally number from a tally type: `F4:N` -> 4, `*F14:P` -> 14.
 *
 * @returns The number, or undefined if the type has no `F<n>` part
 */
export function tallyNumber(tallyType: string): number | undefined {
  const match = /^\*?F(\d+)/.exec(normalizeTallyType(tallyType));
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * `F4:N ( 101 < 50[3 4 0] < 1 )`
 */
export function tallyCard(tallyType: string, tallyPath: string): string {
  return `${normalizeTallyType(tallyType)} ${tallyPath}`;
}

/**
 * Segment divisor card carrying the target cell volume, e.g. `SD4 2.75`.
 *
 * @returns The card, or undefined if the tally type has no tally number
 */
export function volumeCard(tallyType: string, volume: number): string | undefined {
  const n = tallyNumber(tallyType);
  return n === undefined ? undefined : `SD${n} ${volume}`;
}

/**
 * Placeholder SD card shown when the operator does not know the volume.
 */
export function volumeCardTemplate(tallyType: string, targetCell: number): string {
  const n = tallyNumber(tallyType) ?? '<n>';
  return `SD${n} <volume_of_cell_${targetCell}_in_cm3>`;
}

export interface SourceOptions {
  /** Distribution number used for CEL=d<n>, SI<n> and SP<n> */
  readonly distribution: number;
  /** Position in the target cell's local frame */
  readonly position?: readonly [number, number, number];
  /** Energy in MeV */
  readonly energy?: number;
}

/**
 * The three cards of a cell-sampled source definition.
 */
export interface SourceCards {
  readonly sdef: string;
  readonly si: string;
  readonly sp: string;
  /** Number of listed source paths */
  readonly entries: number;
}

/**
 * Build SDEF / SI / SP cards. Non-contiguous lattice selections become one
 * SI entry per position with equal probabilities.
 */
export function sourceDefinition(
  stack: ReadonlyArray<ContainmentNode>,
  options: SourceOptions,
  targetCell?: number
): SourceCards {
  const n = options.distribution;

  let sdef = `SDEF CEL=d${n}`;
  if (options.position) {
    const [x, y, z] = options.position;
    sdef += ` POS=${x} ${y} ${z}`;
  }
  if (options.energy !== undefined) {
    sdef += ` ERG=${options.energy}`;
  }

  const paths = buildSourcePaths(stack, targetCell);
  return Object.freeze({
    sdef,
    si: `SI${n} L ${paths.join(' ')}`,
    sp: `SP${n} ${paths.map(() => '1').join(' ')}`,
    entries: paths.length,
  });
}

/**
 * Deck snippet that starts 50 particles in the addressed cell so the
 * operator can confirm the path in the PRINT 110 table.
 */
export function verificationDeck(stack: ReadonlyArray<ContainmentNode>, targetCell?: number): string[] {
  return [
    'C --- Paste this into an MCNP input for verification ---',
    'C --- Run with 50 particles and check PRINT 110 output ---',
    '',
    'SDEF CEL=d1 ERG=1.0',
    `SI1 L ${buildTallyPath(stack, targetCell)}`,
    'SP1 1',
    'C',
    'NPS 50',
    'PRINT 110',
    'C',
    'C Set all materials to VOID for testing:',
    'C M0   $ Void',
  ];
}
