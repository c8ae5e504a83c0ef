import type { LedgerflowEnv } from '@ledgerflow/env';
import { ConsoleSink, FileSink, initLogger, type Sink } from '@ledgerflow/logger';
import pc from 'picocolors';

export interface CliLoggingOptions {
  verbose?: boolean | undefined;
}

/**
 * Route logs to stderr, plus a JSON-lines file when LEDGERFLOW_LOG_FILE is set.
 * `--verbose` lowers the threshold to debug.
 */
export function configureCliLogging(options: CliLoggingOptions, env: LedgerflowEnv): void {
  const sinks: Sink[] = [new ConsoleSink({ color: pc.isColorSupported })];
  if (env.LEDGERFLOW_LOG_FILE) {
    sinks.push(new FileSink({ path: env.LEDGERFLOW_LOG_FILE }));
  }

  initLogger({
    level: options.verbose ? 'debug' : env.LEDGERFLOW_LOG_LEVEL,
    sinks,
  });
}
