import { flushLoggers } from '@txledger/logger';
import pc from 'picocolors';

import { type ExitCode, exitWithCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCode, string>> = {
  2: 'Check your command options and try again. Run with --help for usage information.',
  8: 'The transaction log must be a CSV file with the columns type, client, tx, amount.',
  11: 'Usage: txledger <transactions-file>',
};

/**
 * Render a CLI error for stderr, with a contextual tip where one exists.
 */
export function formatCliError(error: Error, exitCode: ExitCode): string {
  let text = `\n${pc.red('✗')} Error: ${error.message}\n`;

  const tip = ERROR_TIPS[exitCode];
  if (tip) {
    text += `\n${pc.dim(tip)}\n`;
  }

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    text += `\n${pc.dim(error.stack)}\n\n`;
  }

  return text;
}

/**
 * Display a CLI error on stderr and exit. Nothing is written to stdout.
 */
export function displayCliError(error: Error, exitCode: ExitCode): never {
  flushLoggers();
  process.stderr.write(formatCliError(error, exitCode));
  exitWithCode(exitCode);
}
