import { toError } from '@txledger/core';
import { readTransactions } from '@txledger/import';
import { TransactionProcessor, type ReplayReport } from '@txledger/ledger';
import { getLogger } from '@txledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { ReplayHandlerParams } from './replay-utils.js';
import { formatAccounts } from './replay-utils.js';

export type { ReplayHandlerParams };

const logger = getLogger('ReplayHandler');

/**
 * Result of the replay operation.
 */
export interface ReplayResult {
  report: ReplayReport;

  /** Encoded snapshot, ready for stdout */
  content: string;
}

/**
 * Replay handler - reads the log, runs the processor and encodes the snapshot.
 * Nothing is written here, so a failed read never produces partial output.
 */
export class ReplayHandler {
  constructor(private readonly loadTransactions: typeof readTransactions = readTransactions) {}

  async execute(params: ReplayHandlerParams): Promise<Result<ReplayResult, Error>> {
    try {
      logger.info({ inputPath: params.inputPath, format: params.format }, 'Starting replay');

      const transactionsResult = await this.loadTransactions(params.inputPath);
      if (transactionsResult.isErr()) {
        return err(transactionsResult.error);
      }

      const processor = new TransactionProcessor({
        lockedAccountPolicy: params.lockedAccountPolicy,
        maxDeferrals: params.maxDeferrals,
      });
      const report = processor.process(transactionsResult.value);

      return ok({ report, content: formatAccounts(report.accounts.values(), params.format) });
    } catch (error) {
      return err(toError(error));
    }
  }
}
