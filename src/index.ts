#!/usr/bin/env node
/**
 * Entry point: `scent-catalog serve` (default) and `scent-catalog precompress`.
 */

import { createProgram } from './cli/index.js';
import { logError, toError } from './errors/index.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logError(toError(error));
    process.exitCode = 1;
  });
