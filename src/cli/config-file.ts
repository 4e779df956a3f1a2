/**
 * Locate and read the JSON5 config file.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { DEFAULT_CONFIG, parseConfig, type ToolConfig } from '../lib/config/config.js';
import { isLatticeError, LatticeError } from '../lib/core/errors.js';

export const DEFAULT_CONFIG_FILE = 'latpath.config.json5';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read `file`, or `latpath.config.json5` in `cwd` when no file is named.
 * A missing default file means the built-in defaults; a missing named file
 * is an error.
 *
 * @throws LatticeError (INVALID_CONFIG) naming the file
 */
export async function loadConfig(file?: string, cwd = process.cwd()): Promise<ToolConfig> {
  const path = resolve(cwd, file ?? DEFAULT_CONFIG_FILE);

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (file === undefined && isMissingFile(error)) {
      return DEFAULT_CONFIG;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new LatticeError('INVALID_CONFIG', `Cannot read config file ${path}\n  ${reason}`);
  }

  try {
    return parseConfig(text);
  } catch (error) {
    if (isLatticeError(error)) {
      throw new LatticeError(error.reason, `${error.message}\n  In: ${path}`);
    }
    throw error;
  }
}
