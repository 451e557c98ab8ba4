import type { Decimal } from 'decimal.js';

export const TRANSACTION_TYPES = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/**
 * Types whose records are kept in the reference index and can be disputed.
 */
export type ReferenceableType = Extract<TransactionType, 'deposit' | 'withdrawal'>;

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffffffff;

/**
 * A single record of the input log. Never mutated after it is read.
 */
export interface Transaction {
  readonly type: TransactionType;
  readonly clientId: number;
  /** Unique among deposits/withdrawals; dispute-family records reuse the id they reference */
  readonly txId: number;
  /** Only meaningful for deposits and withdrawals */
  readonly amount?: Decimal | undefined;
}

export type ReferenceableTransaction = Transaction & { readonly type: ReferenceableType };

export function isReferenceable(tx: Transaction): tx is ReferenceableTransaction {
  return tx.type === 'deposit' || tx.type === 'withdrawal';
}
