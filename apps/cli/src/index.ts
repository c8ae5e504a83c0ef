#!/usr/bin/env -S node --import tsx
import { CommanderError } from 'commander';

import { ExitCodes } from './features/shared/exit-codes.js';
import { createProgram } from './program.js';

const program = createProgram().exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (!(error instanceof CommanderError)) {
    throw error;
  }
  // commander already printed the usage error; help and --version exit cleanly
  process.exitCode = error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS;
}
