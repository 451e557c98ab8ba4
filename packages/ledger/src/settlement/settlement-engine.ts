import type { Account, Transaction } from '@txledger/core';

/**
 * Why a transaction left its account untouched.
 */
export type SkipReason = 'missing-amount' | 'insufficient-funds' | 'missing-reference' | 'account-locked';

export type SettlementOutcome = { status: 'settled' } | { status: 'skipped'; reason: SkipReason };

const SETTLED: SettlementOutcome = { status: 'settled' };

function skipped(reason: SkipReason): SettlementOutcome {
  return { status: 'skipped', reason };
}

/**
 * Apply one transaction to an account in place.
 *
 * Dispute, resolve and chargeback always move the amount of the referenced
 * deposit/withdrawal, never a value derived from current balances. Nothing here
 * checks the dispute lifecycle: a resolve without a prior dispute, or a second
 * dispute of the same transaction, still moves funds. Skips are reported through
 * the outcome and never thrown.
 */
export function settleTransaction(account: Account, tx: Transaction, referenced?: Transaction): SettlementOutcome {
  switch (tx.type) {
    case 'deposit': {
      if (!tx.amount) return skipped('missing-amount');
      account.available = account.available.plus(tx.amount);
      account.total = account.total.plus(tx.amount);
      return SETTLED;
    }
    case 'withdrawal': {
      if (!tx.amount) return skipped('missing-amount');
      if (account.available.lessThan(tx.amount)) return skipped('insufficient-funds');
      account.available = account.available.minus(tx.amount);
      account.total = account.total.minus(tx.amount);
      return SETTLED;
    }
    case 'dispute': {
      if (!referenced) return skipped('missing-reference');
      if (!referenced.amount) return skipped('missing-amount');
      account.available = account.available.minus(referenced.amount);
      account.held = account.held.plus(referenced.amount);
      return SETTLED;
    }
    case 'resolve': {
      if (!referenced) return skipped('missing-reference');
      if (!referenced.amount) return skipped('missing-amount');
      account.available = account.available.plus(referenced.amount);
      account.held = account.held.minus(referenced.amount);
      return SETTLED;
    }
    case 'chargeback': {
      if (!referenced) return skipped('missing-reference');
      if (!referenced.amount) return skipped('missing-amount');
      account.held = account.held.minus(referenced.amount);
      account.total = account.total.minus(referenced.amount);
      account.locked = true;
      return SETTLED;
    }
  }
}
