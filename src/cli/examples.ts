/**
 * Worked scenarios shipped as stack definition files under examples/.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import JSON5 from 'json5';
import { sourceDefinition, tallyCard, volumeCardTemplate } from '../lib/cards/cards.js';
import { LatticeError } from '../lib/core/errors.js';
import { buildTallyPath, hasDiscreteLattice, needsVolumeCard } from '../lib/path/path-builder.js';
import { stackFromDefinition, type ParsedStack } from '../lib/parser/stack-parser.js';

export interface ExampleScenario {
  readonly name: string;
  readonly title: string;
  readonly scenario: ReadonlyArray<string>;
  readonly parsed: ParsedStack;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** examples/ at the package root, from both src/cli and dist/cli */
export function examplesDirectory(): string {
  return fileURLToPath(new URL('../../examples/', import.meta.url));
}

/**
 * Parse one example file: a stack definition with `title` and `scenario`.
 *
 * @throws LatticeError (INVALID_STACK) naming the file
 */
export function parseExample(name: string, text: string): ExampleScenario {
  try {
    const value: unknown = JSON5.parse(text);
    const parsed = stackFromDefinition(value);
    const record: Record<string, unknown> = isRecord(value) ? value : {};
    const title = typeof record.title === 'string' ? record.title : name;
    const scenario = Array.isArray(record.scenario) ? record.scenario.map((line: unknown) => String(line)) : [];
    return Object.freeze({ name, title, scenario, parsed });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LatticeError('INVALID_STACK', `Invalid example ${name}: ${message}`);
  }
}

export async function loadExamples(directory = examplesDirectory()): Promise<ExampleScenario[]> {
  const names = (await readdir(directory)).filter(name => name.endsWith('.json5')).sort();
  return Promise.all(
    names.map(async name => parseExample(name, await readFile(join(directory, name), 'utf8')))
  );
}

/**
 * Lines shown for one scenario by `latpath examples`.
 */
export function describeExample(example: ExampleScenario, number: number, tallyType = 'F4:N'): string[] {
  const { stack, targetCell } = example.parsed;
  const lines = [
    '',
    '='.repeat(70),
    `EXAMPLE ${number}: ${example.title}`,
    '='.repeat(70),
    '',
    'Scenario:',
    ...example.scenario.map(line => `  - ${line}`),
    '',
    'Tally card:',
    `  ${tallyCard(tallyType, buildTallyPath(stack, targetCell))}`,
  ];

  if (needsVolumeCard(stack)) {
    lines.push(`  ${volumeCardTemplate(tallyType, targetCell)}  $ required: Cell ${targetCell} is inside a lattice`);
  }

  if (hasDiscreteLattice(stack)) {
    const cards = sourceDefinition(stack, { distribution: 1 }, targetCell);
    lines.push('', 'Source definition:', `  ${cards.sdef}`, `  ${cards.si}`, `  ${cards.sp}`);
  }
  return lines;
}
