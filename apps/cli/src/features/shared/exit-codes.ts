import { ConfigurationError, TransactionParseError } from '@txledger/core';

/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all, including output write failures) */
  GENERAL_ERROR: 1,

  /** Invalid command options */
  INVALID_ARGS: 2,

  /** Input log unreadable or a record failed validation */
  VALIDATION_ERROR: 8,

  /** Configuration error (missing input path, bad environment) */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Pick the exit code matching an error raised by the replay pipeline.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof ConfigurationError) return ExitCodes.CONFIG_ERROR;
  if (error instanceof TransactionParseError) return ExitCodes.VALIDATION_ERROR;
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
