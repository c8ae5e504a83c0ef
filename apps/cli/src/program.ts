import { Command } from 'commander';

import { registerProcessCommand } from './features/process/process.js';

export const VERSION = '0.1.0';

/**
 * Build the `ledgerflow` program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('ledgerflow')
    .description('Replay deposits, withdrawals and disputes from a CSV file and print the final account states')
    .version(VERSION);

  registerProcessCommand(program);

  return program;
}
