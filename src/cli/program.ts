/**
 * Command-line interface.
 *
 *     latpath [wizard]              interactive dialogue (default)
 *     latpath path <file> [opts]    cards from a stack definition file
 *     latpath examples              worked scenarios
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import {
  normalizeTallyType,
  sourceDefinition,
  tallyCard,
  tallyNumber,
  verificationDeck,
  volumeCard,
  volumeCardTemplate,
} from '../lib/cards/cards.js';
import type { ToolConfig } from '../lib/config/config.js';
import { LatticeError } from '../lib/core/errors.js';
import {
  buildTallyPath,
  checkDiscreteAmbiguity,
  hasDiscreteLattice,
  needsVolumeCard,
} from '../lib/path/path-builder.js';
import { formatStackDefinition, parseStackDefinition, type ParsedStack } from '../lib/parser/stack-parser.js';
import { loadConfig } from './config-file.js';
import { describeExample, loadExamples } from './examples.js';
import { ReadlinePrompter } from './prompter.js';
import { runTerminalSelector } from './terminal-selector.js';
import { runWizard } from './wizard.js';

export const VERSION = '0.1.0';

interface GlobalOptions {
  config?: string;
}

export interface PathOptions {
  /** Tally type, or true to use the configured default */
  tally?: string | true;
  volume?: number;
  sdef?: boolean;
  dist?: number;
  pos?: [number, number, number];
  erg?: number;
  verify?: boolean;
  json?: boolean;
}

export interface PathReport {
  /** Cards, for stdout */
  readonly lines: string[];
  /** Advisories, for stderr */
  readonly warnings: string[];
}

// =============================================================================
// Option parsers
// =============================================================================

export function parsePositiveInt(value: string): number {
  const n = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = parseNumber(value);
  if (n <= 0) {
    throw new InvalidArgumentError('Expected a number greater than zero.');
  }
  return n;
}

/** `x,y,z` */
export function parsePosition(value: string): [number, number, number] {
  const parts = value.split(',');
  if (parts.length !== 3) {
    throw new InvalidArgumentError('Expected three comma-separated coordinates, e.g. 0,0,1.5');
  }
  const [x, y, z] = parts.map(parseNumber);
  return [x, y, z];
}

export function parseTallyType(value: string): string {
  const tallyType = normalizeTallyType(value);
  if (tallyNumber(tallyType) === undefined) {
    throw new InvalidArgumentError('Expected a tally type like F4:N.');
  }
  return tallyType;
}

// =============================================================================
// path command
// =============================================================================

async function readDefinition(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LatticeError('INVALID_STACK', `Cannot read stack definition ${path}\n  ${reason}`);
  }
}

/**
 * Cards for a parsed stack according to the `path` command options. With no
 * card options the bare tally path is printed.
 */
export function pathReport(parsed: ParsedStack, options: PathOptions, config: ToolConfig): PathReport {
  const { stack, targetCell } = parsed;
  const lines: string[] = [];
  const warnings: string[] = [];

  if (options.json) {
    return { lines: [formatStackDefinition(stack)], warnings };
  }

  const ambiguity = checkDiscreteAmbiguity(stack);
  if (ambiguity) {
    warnings.push(`Warning: ${ambiguity.details ?? ambiguity.reason}`);
  }

  if (options.tally === undefined && !options.sdef && !options.verify) {
    lines.push(buildTallyPath(stack, targetCell));
  }

  if (options.tally !== undefined) {
    const tallyType = options.tally === true ? config.tally.defaultType : options.tally;
    lines.push(tallyCard(tallyType, buildTallyPath(stack, targetCell)));

    if (needsVolumeCard(stack)) {
      const sd = options.volume === undefined ? undefined : volumeCard(tallyType, options.volume);
      if (sd) {
        lines.push(sd);
      } else {
        warnings.push(
          `Warning: Cell ${targetCell} is inside a lattice; this tally needs an SD card.`,
          `  Add: ${volumeCardTemplate(tallyType, targetCell)}`
        );
      }
    } else if (options.volume !== undefined) {
      warnings.push(`Warning: --volume ignored; Cell ${targetCell} is not inside a lattice.`);
    }
  }

  if (options.sdef) {
    const cards = sourceDefinition(
      stack,
      {
        distribution: options.dist ?? config.source.defaultDistribution,
        position: options.pos,
        energy: options.erg,
      },
      targetCell
    );
    if (hasDiscreteLattice(stack)) {
      warnings.push(
        `Warning: non-contiguous selection; ${cards.entries} source locations with equal probability.`
      );
    }
    lines.push(cards.sdef, cards.si, cards.sp);
  }

  if (options.verify) {
    lines.push(...verificationDeck(stack, targetCell));
  }

  return { lines, warnings };
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(cwd = process.cwd()): Command {
  const program = new Command();

  program
    .name('latpath')
    .version(VERSION)
    .description('Universe and lattice path wizard for MCNP tallies and source definitions')
    .option('-c, --config <file>', 'JSON5 settings file (default: latpath.config.json5 when present)')
    .showHelpAfterError();

  const config = (): Promise<ToolConfig> => loadConfig(program.opts<GlobalOptions>().config, cwd);

  program
    .command('wizard', { isDefault: true })
    .description('Build a containment stack interactively and generate cards')
    .action(async () => {
      const prompter = new ReadlinePrompter();
      try {
        await runWizard({ prompter, config: await config(), launchSelector: runTerminalSelector });
      } finally {
        prompter.close();
      }
    });

  program
    .command('path')
    .description('Generate cards from a JSON5 stack definition file')
    .argument('<file>', 'stack definition (nodes innermost first)')
    .option('-t, --tally [type]', 'tally card; type defaults to the configured one', parseTallyType)
    .option('--volume <cm3>', 'target cell volume for the SD card', parsePositiveNumber)
    .option('-s, --sdef', 'source definition (SDEF/SI/SP)')
    .option('--dist <n>', 'distribution number', parsePositiveInt)
    .option('--pos <x,y,z>', 'source position in the target cell frame', parsePosition)
    .option('--erg <MeV>', 'source energy', parseNumber)
    .option('--verify', 'verification deck snippet')
    .option('--json', 'print the normalized stack definition')
    .action(async (file: string, options: PathOptions) => {
      const settings = await config();
      const parsed = parseStackDefinition(await readDefinition(resolve(cwd, file)));
      const report = pathReport(parsed, options, settings);
      for (const warning of report.warnings) console.warn(warning);
      for (const line of report.lines) console.log(line);
    });

  program
    .command('examples')
    .description('Show worked scenarios')
    .action(async () => {
      const settings = await config();
      const examples = await loadExamples();
      examples.forEach((example, n) => {
        for (const line of describeExample(example, n + 1, settings.tally.defaultType)) console.log(line);
      });
    });

  return program;
}
