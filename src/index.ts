#!/usr/bin/env node
/**
 * Main entry point for the ical-to-masto command
 */

import { createProgram } from './cli.js';
import { errorMessage } from './utils/errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  });
