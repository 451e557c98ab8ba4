import { Decimal } from 'decimal.js';

/**
 * Balance state of one client. Mutated in place by settlement.
 *
 * `total` always equals `available + held` after a settlement step; `locked`
 * flips to true on chargeback and never flips back.
 */
export interface Account {
  readonly clientId: number;
  available: Decimal;
  held: Decimal;
  total: Decimal;
  locked: boolean;
}

export function createAccount(clientId: number): Account {
  return {
    clientId,
    available: new Decimal(0),
    held: new Decimal(0),
    total: new Decimal(0),
    locked: false,
  };
}

/**
 * True when `total == available + held`.
 */
export function isBalanced(account: Account): boolean {
  return account.total.equals(account.available.plus(account.held));
}
