import {
  createAccount,
  formatDecimal,
  isBalanced,
  isReferenceable,
  type Account,
  type Transaction,
} from '@txledger/core';
import { getLogger } from '@txledger/logger';

import { settleTransaction, type SettlementOutcome, type SkipReason } from '../settlement/settlement-engine.js';

/**
 * Whether transactions addressed to a locked account still settle.
 */
export type LockedAccountPolicy = 'allow' | 'reject';

export interface ProcessorOptions {
  /** Defaults to 'allow': a chargeback locks the account but later records still apply */
  lockedAccountPolicy?: LockedAccountPolicy | undefined;
  /** Maximum times one dispute-family record may be requeued before it is dropped (default: unbounded) */
  maxDeferrals?: number | undefined;
}

export interface ReplayStats {
  /** Input records consumed */
  processed: number;
  settled: number;
  /** Requeue events, counting a record once per deferral */
  deferred: number;
  skipped: Record<SkipReason, number>;
  /** Dispute-family records whose referenced transaction belongs to another client */
  clientMismatches: number;
  /** Deposits/withdrawals that replaced an earlier record with the same tx id in the index */
  duplicateReferences: number;
}

export interface ReplayReport {
  accounts: Map<number, Account>;
  /** Dispute-family records whose reference never appeared, in queue order */
  unresolved: Transaction[];
  stats: ReplayStats;
}

interface QueuedTransaction {
  tx: Transaction;
  deferrals: number;
}

function emptyStats(processed: number): ReplayStats {
  return {
    processed,
    settled: 0,
    deferred: 0,
    skipped: {
      'account-locked': 0,
      'insufficient-funds': 0,
      'missing-amount': 0,
      'missing-reference': 0,
    },
    clientMismatches: 0,
    duplicateReferences: 0,
  };
}

/**
 * Replays an ordered transaction log into per-client accounts.
 *
 * Deposits and withdrawals settle on arrival and enter the reference index.
 * A dispute, resolve or chargeback whose tx id is not indexed yet goes to the back
 * of the queue. Once every record left in the queue has been requeued since the
 * last one was consumed, no further record can resolve, so the loop stops and
 * returns the remainder as `unresolved`.
 */
export class TransactionProcessor {
  private readonly logger = getLogger('TransactionProcessor');
  private readonly lockedAccountPolicy: LockedAccountPolicy;
  private readonly maxDeferrals: number | undefined;

  constructor(options: ProcessorOptions = {}) {
    if (options.maxDeferrals !== undefined && (!Number.isInteger(options.maxDeferrals) || options.maxDeferrals < 0)) {
      throw new RangeError(`maxDeferrals must be a non-negative integer, got ${String(options.maxDeferrals)}`);
    }
    this.lockedAccountPolicy = options.lockedAccountPolicy ?? 'allow';
    this.maxDeferrals = options.maxDeferrals;
  }

  process(transactions: readonly Transaction[]): ReplayReport {
    const accounts = new Map<number, Account>();
    const references = new Map<number, Transaction>();
    const unresolved: Transaction[] = [];
    const stats = emptyStats(transactions.length);

    const queue: QueuedTransaction[] = transactions.map((tx) => ({ tx, deferrals: 0 }));
    let head = 0;
    let deferredSinceProgress = 0;

    const record = (tx: Transaction, outcome: SettlementOutcome): void => {
      deferredSinceProgress = 0;
      if (outcome.status === 'settled') {
        stats.settled++;
        return;
      }
      stats.skipped[outcome.reason]++;
      this.logger.debug(
        {
          type: tx.type,
          clientId: tx.clientId,
          txId: tx.txId,
          amount: tx.amount ? formatDecimal(tx.amount) : undefined,
          reason: outcome.reason,
        },
        'Skipped'
      );
    };

    while (head < queue.length) {
      const item = queue[head++];
      if (!item) break;
      const { tx } = item;

      let account = accounts.get(tx.clientId);
      if (!account) {
        account = createAccount(tx.clientId);
        accounts.set(tx.clientId, account);
      }

      if (account.locked && this.lockedAccountPolicy === 'reject') {
        record(tx, { status: 'skipped', reason: 'account-locked' });
        continue;
      }

      if (isReferenceable(tx)) {
        record(tx, settleTransaction(account, tx));
        if (references.has(tx.txId)) {
          stats.duplicateReferences++;
          this.logger.warn({ txId: tx.txId, clientId: tx.clientId }, 'Duplicate tx id replaces earlier reference');
        }
        references.set(tx.txId, tx);
        continue;
      }

      const referenced = references.get(tx.txId);
      if (referenced) {
        if (referenced.clientId !== tx.clientId) {
          stats.clientMismatches++;
          this.logger.warn(
            { type: tx.type, txId: tx.txId, clientId: tx.clientId, referencedClientId: referenced.clientId },
            'Referenced transaction belongs to another client'
          );
        }
        record(tx, settleTransaction(account, tx, referenced));
        continue;
      }

      if (this.maxDeferrals !== undefined && item.deferrals >= this.maxDeferrals) {
        unresolved.push(tx);
        deferredSinceProgress = 0;
        this.logger.debug({ type: tx.type, txId: tx.txId, deferrals: item.deferrals }, 'Deferral limit reached');
        continue;
      }

      item.deferrals++;
      stats.deferred++;
      queue.push(item);
      deferredSinceProgress++;

      if (deferredSinceProgress >= queue.length - head) {
        for (const stuck of queue.slice(head)) {
          unresolved.push(stuck.tx);
        }
        break;
      }
    }

    for (const tx of unresolved) {
      this.logger.debug({ type: tx.type, clientId: tx.clientId, txId: tx.txId }, 'Reference never appeared');
    }
    if (unresolved.length > 0) {
      this.logger.warn(
        { count: unresolved.length, txIds: unresolved.map((tx) => tx.txId).join(',') },
        'Dropped dispute-family records whose referenced transaction never appeared'
      );
    }
    for (const account of accounts.values()) {
      if (!isBalanced(account)) {
        this.logger.error({ clientId: account.clientId }, 'Account total diverged from available + held');
      }
    }

    this.logger.info(
      { accounts: accounts.size, settled: stats.settled, deferred: stats.deferred, unresolved: unresolved.length },
      'Replay finished'
    );

    return { accounts, unresolved, stats };
  }
}

/**
 * One-shot replay with a fresh processor.
 */
export function replayTransactions(transactions: readonly Transaction[], options?: ProcessorOptions): ReplayReport {
  return new TransactionProcessor(options).process(transactions);
}
