#!/usr/bin/env node
/**
 * Main entry point for the latpath CLI
 */

import { createProgram } from './cli/program.js';
import { InputClosedError } from './cli/prompter.js';
import { isLatticeError } from './lib/core/errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof InputClosedError) {
      console.error('\nWizard cancelled by user.');
    } else if (isLatticeError(error)) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Error:', error);
    }
    process.exitCode = 1;
  });
