/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** Engine aborted or any other failure */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found */
  NOT_FOUND: 4,

  /** Output sanity check failed */
  VALIDATION_ERROR: 8,

  /** Invalid environment configuration */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

