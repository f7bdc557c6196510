#!/usr/bin/env tsx
/**
 * hook-gate CLI
 *
 * Main entry point for the hook-gate command.
 */

import { errorMessage } from '@hook-gate/common';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(`[hook-gate] ${errorMessage(error)}`);
    process.exitCode = 1;
  });
