/**
 * Tool configuration, read from a JSON5 file.
 *
 *     {
 *       selector: { maxCellsPerLayer: 400, maxTotalCells: 2000 },
 *       source: { defaultDistribution: 1 },
 *       tally: { defaultType: 'F4:N' },
 *     }
 *
 * Every key is optional; missing keys take the defaults.
 */

import JSON5 from 'json5';
import { LatticeError } from '../core/errors.js';
import { DEFAULT_SELECTOR_LIMITS, type SelectorLimits } from '../selector/size-guard.js';

export interface ToolConfig {
  readonly selector: SelectorLimits;
  readonly source: {
    readonly defaultDistribution: number;
  };
  readonly tally: {
    readonly defaultType: string;
  };
}

export const DEFAULT_CONFIG: ToolConfig = Object.freeze({
  selector: DEFAULT_SELECTOR_LIMITS,
  source: Object.freeze({ defaultDistribution: 1 }),
  tally: Object.freeze({ defaultType: 'F4:N' }),
});

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Section, name: string): Section {
  const value = root[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new LatticeError('INVALID_CONFIG', `Invalid config: '${name}' must be an object`);
  }
  return value;
}

function positiveInteger(values: Section, path: string, key: string, fallback: number): number {
  const value = values[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1) {
    throw new LatticeError(
      'INVALID_CONFIG',
      `Invalid config: '${path}.${key}' must be a positive integer, got ${JSON.stringify(value)}`
    );
  }
  return value;
}

function nonEmptyString(values: Section, path: string, key: string, fallback: string): string {
  const value = values[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new LatticeError(
      'INVALID_CONFIG',
      `Invalid config: '${path}.${key}' must be a non-empty string, got ${JSON.stringify(value)}`
    );
  }
  return value.trim();
}

/**
 * Merge a parsed config object over the defaults.
 *
 * @throws LatticeError (INVALID_CONFIG) naming the offending key
 */
export function configFromObject(value: unknown): ToolConfig {
  if (!isRecord(value)) {
    throw new LatticeError('INVALID_CONFIG', 'Invalid config: expected an object at the top level');
  }

  const selector = section(value, 'selector');
  const source = section(value, 'source');
  const tally = section(value, 'tally');
  const defaults = DEFAULT_CONFIG;

  return Object.freeze({
    selector: Object.freeze({
      maxCellsPerLayer: positiveInteger(
        selector,
        'selector',
        'maxCellsPerLayer',
        defaults.selector.maxCellsPerLayer
      ),
      maxTotalCells: positiveInteger(selector, 'selector', 'maxTotalCells', defaults.selector.maxTotalCells),
    }),
    source: Object.freeze({
      defaultDistribution: positiveInteger(
        source,
        'source',
        'defaultDistribution',
        defaults.source.defaultDistribution
      ),
    }),
    tally: Object.freeze({
      defaultType: nonEmptyString(tally, 'tally', 'defaultType', defaults.tally.defaultType).toUpperCase(),
    }),
  });
}

/**
 * Parse JSON5 config text.
 *
 * @throws LatticeError (INVALID_CONFIG) for syntax errors or invalid values
 */
export function parseConfig(text: string): ToolConfig {
  let value: unknown;
  try {
    value = JSON5.parse(text);
  } catch (e) {
    throw new LatticeError('INVALID_CONFIG', `Invalid JSON5: ${e instanceof Error ? e.message : String(e)}`);
  }
  return configFromObject(value);
}
