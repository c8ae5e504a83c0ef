import { flushLoggers, getLogger } from '@ledgerflow/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, type FailureExitCode } from './cli-response.js';
import { ExitCodes } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

export interface OutputStreams {
  stdout: Pick<NodeJS.WritableStream, 'write'>;
  stderr: Pick<NodeJS.WritableStream, 'write'>;
}

/**
 * OutputManager handles formatting and displaying CLI output.
 *
 * stdout carries only the result (CSV report or JSON envelope); diagnostics go to stderr.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(
    private format: OutputFormat = 'text',
    private readonly streams: OutputStreams = { stdout: process.stdout, stderr: process.stderr }
  ) {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, Date.now() - this.startTime);
      this.streams.stdout.write(`${JSON.stringify(response, undefined, 2)}\n`);
    }
  }

  /**
   * Write a rendered report to stdout (only in text mode).
   */
  report(content: string): void {
    if (this.format === 'text') {
      this.streams.stdout.write(content);
    }
  }

  /**
   * Display a warning.
   */
  warn(message: string): void {
    if (this.format === 'text') {
      this.streams.stderr.write(`${pc.yellow('⚠')} ${message}\n`);
    } else {
      // In JSON mode, warnings go to stderr as structured logs
      logger.warn(message);
    }
  }

  /**
   * Output an error response and exit.
   *
   * @param heading - text-mode line printed above the message instead of the generic prefix
   */
  error(command: string, error: Error, exitCode: FailureExitCode = ExitCodes.GENERAL_ERROR, heading?: string): never {
    flushLoggers();

    if (this.format === 'json') {
      // In JSON mode, write to stdout (not stderr) so callers can parse the response
      this.streams.stdout.write(`${JSON.stringify(createErrorResponse(command, error, exitCode), undefined, 2)}\n`);
    } else {
      this.displayTextError(error, exitCode, heading);
    }

    process.exit(exitCode);
  }

  private displayTextError(error: Error, exitCode: FailureExitCode, heading: string | undefined): void {
    if (heading) {
      this.streams.stderr.write(`${pc.red(heading)}\n${error.message}\n`);
    } else {
      this.streams.stderr.write(`${pc.red('✗')} Error: ${error.message}\n`);
    }

    if (exitCode === ExitCodes.INVALID_ARGS) {
      this.streams.stderr.write(
        `\n${pc.dim('Check your command arguments and try again. Run with --help for usage information.')}\n`
      );
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      this.streams.stderr.write(`\n${pc.dim(error.stack)}\n`);
    }
  }
}
