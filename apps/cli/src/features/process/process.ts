import { getEnv, type LedgerflowEnv } from '@ledgerflow/env';
import { formatAccountRowsAsCSV } from '@ledgerflow/ingestion';
import { flushLoggers } from '@ledgerflow/logger';
import type { Command } from 'commander';

import { ExitCodes } from '../shared/exit-codes.js';
import { configureCliLogging } from '../shared/logging.js';
import { OutputManager } from '../shared/output.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler, type ProcessResult } from './process-handler.js';
import { buildProcessParamsFromFlags, exitCodeForError, headingForError, toSummaryData } from './process-utils.js';

const COMMAND = 'ledgerflow';

/**
 * Register the input argument, options and action on the root program.
 */
export function registerProcessCommand(program: Command): void {
  program
    .argument('<input>', 'CSV file with columns type, client, tx, amount')
    .option(
      '--on-error <policy>',
      'What to do with a failing record: abort or skip (default: LEDGERFLOW_ERROR_POLICY, else abort)'
    )
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log debug details to stderr')
    .action(async (input: string, rawOptions: unknown) => {
      await executeProcessCommand(input, rawOptions);
    });
}

/**
 * Execute the process command.
 */
async function executeProcessCommand(input: string, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  // Validate options at CLI boundary with Zod
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error(COMMAND, new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  let env: LedgerflowEnv;
  try {
    env = getEnv();
  } catch (error) {
    output.error(COMMAND, error instanceof Error ? error : new Error(String(error)), ExitCodes.CONFIG_ERROR);
    return;
  }

  configureCliLogging(options, env);

  const paramsResult = buildProcessParamsFromFlags(input, options, env);
  if (paramsResult.isErr()) {
    output.error(COMMAND, paramsResult.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const handler = new ProcessHandler();
  const result = await handler.execute(paramsResult.value);

  if (result.isErr()) {
    output.error(COMMAND, result.error, exitCodeForError(result.error), headingForError(result.error));
    return;
  }

  handleProcessSuccess(output, result.value);
  flushLoggers();
}

/**
 * Handle successful processing.
 */
function handleProcessSuccess(output: OutputManager, processResult: ProcessResult): void {
  const { accounts, summary } = processResult;

  if (output.isJsonMode()) {
    output.json(COMMAND, { accounts, summary: toSummaryData(summary) });
    return;
  }

  output.report(formatAccountRowsAsCSV(accounts));

  if (summary.skipped.length > 0) {
    output.warn(`Skipped ${summary.skipped.length} of ${summary.processed} records`);
  }
}
