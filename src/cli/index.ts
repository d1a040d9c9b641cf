#!/usr/bin/env node
import { errorMessage } from '../core/errors.js';
import { createProgram, exitCodeFor } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = exitCodeFor(err);
  });
