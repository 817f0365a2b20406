#!/usr/bin/env node
// Executable entry for the benchctl command line.

import { errorMessage } from '../core/errors.js';
import { createProgram } from '../cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
