import { OutputError, getErrorMessage } from '@txledger/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Minimal writable the replay output goes to (process.stdout in production).
 */
export interface OutputStream {
  write(chunk: string, callback: (error: Error | null | undefined) => void): boolean;
  once(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
}

function writeFailed(message: string): Result<void, OutputError> {
  return err(new OutputError(`Failed to write output: ${message}`));
}

/**
 * Write the whole snapshot and resolve once the stream has accepted it.
 *
 * A failed write reports through the callback and then emits 'error' on the stream
 * (EPIPE on a closed stdout, for instance). The one-shot listener stays attached after
 * a failure so that event never surfaces as an uncaught exception.
 */
export function writeOutput(stream: OutputStream, content: string): Promise<Result<void, OutputError>> {
  return new Promise((resolve) => {
    let settled = false;

    const onError = (error: Error): void => {
      if (settled) return;
      settled = true;
      resolve(writeFailed(error.message));
    };

    stream.once('error', onError);

    try {
      stream.write(content, (error) => {
        if (settled) return;
        settled = true;
        if (error) {
          resolve(writeFailed(error.message));
          return;
        }
        stream.off('error', onError);
        resolve(ok(undefined));
      });
    } catch (error) {
      if (!settled) {
        settled = true;
        resolve(writeFailed(getErrorMessage(error)));
      }
    }
  });
}
