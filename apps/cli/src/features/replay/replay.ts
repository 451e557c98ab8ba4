import type { Command } from 'commander';
import { err, ok, type Result } from 'neverthrow';

import { displayCliError } from '../shared/cli-error.js';
import { type ExitCode, ExitCodes, exitCodeForError } from '../shared/exit-codes.js';
import { configureCliLogger } from '../shared/logger-setup.js';
import { type OutputStream, writeOutput } from '../shared/output-writer.js';
import { ReplayCommandOptionsSchema } from '../shared/schemas.js';

import { ReplayHandler, type ReplayResult } from './replay-handler.js';
import { buildReplayParamsFromFlags } from './replay-utils.js';

/**
 * Why the command failed, and the exit code that reports it.
 */
export interface ReplayCommandFailure {
  error: Error;
  exitCode: ExitCode;
}

function failure(error: Error, exitCode: ExitCode = exitCodeForError(error)): ReplayCommandFailure {
  return { error, exitCode };
}

/**
 * Attach the replay action to the root program: `txledger <transactions-file>`.
 */
export function registerReplayCommand(program: Command): void {
  program
    .argument('[transactions-file]', 'CSV transaction log (type, client, tx, amount)')
    .option('--format <type>', 'Output format (csv|text)', 'csv')
    .option('--locked-policy <policy>', 'Whether locked accounts keep accepting transactions (allow|reject)', 'allow')
    .option('--max-deferrals <count>', 'Drop a dispute/resolve/chargeback after this many requeues')
    .option('--verbose', 'Log every skipped transaction to stderr')
    .action(async (inputPath: string | undefined, rawOptions: unknown) => {
      const result = await executeReplayCommand(inputPath, rawOptions, process.stdout);
      if (result.isErr()) {
        displayCliError(result.error.error, result.error.exitCode);
      }
    });
}

/**
 * Execute the replay: validate options, replay the log, write the snapshot.
 * Failures never leave partial output on the stream.
 */
export async function executeReplayCommand(
  inputPath: string | undefined,
  rawOptions: unknown,
  stdout: OutputStream
): Promise<Result<ReplayResult, ReplayCommandFailure>> {
  // Validate options at CLI boundary with Zod
  const validationResult = ReplayCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    return err(failure(new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS));
  }
  const options = validationResult.data;

  const loggerResult = configureCliLogger(options);
  if (loggerResult.isErr()) {
    return err(failure(loggerResult.error));
  }

  const paramsResult = buildReplayParamsFromFlags(inputPath, options);
  if (paramsResult.isErr()) {
    return err(failure(paramsResult.error));
  }

  const handler = new ReplayHandler();
  const replayResult = await handler.execute(paramsResult.value);
  if (replayResult.isErr()) {
    return err(failure(replayResult.error));
  }

  const writeResult = await writeOutput(stdout, replayResult.value.content);
  if (writeResult.isErr()) {
    return err(failure(writeResult.error));
  }

  return ok(replayResult.value);
}
