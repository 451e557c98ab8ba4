import { createAccount, isBalanced } from '@txledger/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { balances, tx } from '../../__tests__/test-utils.js';
import { settleTransaction } from '../settlement-engine.js';

describe('settleTransaction', () => {
  describe('deposit', () => {
    it('should credit available and total', () => {
      const account = createAccount(1);

      const outcome = settleTransaction(account, tx('deposit', 1, 1, '1.05'));

      expect(outcome).toEqual({ status: 'settled' });
      expect(balances(account)).toEqual({ available: '1.05', held: '0', total: '1.05', locked: false });
    });

    it('should ignore a deposit without amount', () => {
      const account = createAccount(1);

      const outcome = settleTransaction(account, tx('deposit', 1, 1));

      expect(outcome).toEqual({ status: 'skipped', reason: 'missing-amount' });
      expect(balances(account)).toEqual({ available: '0', held: '0', total: '0', locked: false });
    });
  });

  describe('withdrawal', () => {
    it('should debit available and total when funds suffice', () => {
      const account = createAccount(1);
      account.available = new Decimal('3.05');
      account.total = new Decimal('3.05');

      const outcome = settleTransaction(account, tx('withdrawal', 1, 2, '1.05'));

      expect(outcome).toEqual({ status: 'settled' });
      expect(balances(account)).toEqual({ available: '2', held: '0', total: '2', locked: false });
    });

    it('should allow withdrawing the exact available balance', () => {
      const account = createAccount(1);
      settleTransaction(account, tx('deposit', 1, 1, '10'));

      settleTransaction(account, tx('withdrawal', 1, 2, '10'));

      expect(balances(account)).toEqual({ available: '0', held: '0', total: '0', locked: false });
    });

    it('should leave the account unchanged when available funds are insufficient', () => {
      const account = createAccount(1);
      account.held = new Decimal('3.05');
      account.total = new Decimal('3.05');

      const outcome = settleTransaction(account, tx('withdrawal', 1, 2, '1.05'));

      expect(outcome).toEqual({ status: 'skipped', reason: 'insufficient-funds' });
      expect(balances(account)).toEqual({ available: '0', held: '3.05', total: '3.05', locked: false });
    });

    it('should ignore a withdrawal without amount', () => {
      const account = createAccount(1);
      settleTransaction(account, tx('deposit', 1, 1, '5'));

      expect(settleTransaction(account, tx('withdrawal', 1, 2))).toEqual({ status: 'skipped', reason: 'missing-amount' });
      expect(balances(account).available).toBe('5');
    });
  });

  describe('dispute lifecycle', () => {
    it('should move the referenced amount from available to held on dispute', () => {
      const deposit = tx('deposit', 1, 1, '500');
      const account = createAccount(1);
      settleTransaction(account, deposit);

      settleTransaction(account, tx('dispute', 1, 1), deposit);

      expect(balances(account)).toEqual({ available: '0', held: '500', total: '500', locked: false });
    });

    it('should restore the account when a dispute is resolved', () => {
      const deposit = tx('deposit', 1, 1, '500');
      const account = createAccount(1);
      settleTransaction(account, deposit);

      settleTransaction(account, tx('dispute', 1, 1), deposit);
      settleTransaction(account, tx('resolve', 1, 1), deposit);

      expect(balances(account)).toEqual({ available: '500', held: '0', total: '500', locked: false });
    });

    it('should remove held funds and lock the account on chargeback', () => {
      const deposit = tx('deposit', 1, 1, '500');
      const account = createAccount(1);
      settleTransaction(account, deposit);

      settleTransaction(account, tx('dispute', 1, 1), deposit);
      settleTransaction(account, tx('chargeback', 1, 1), deposit);

      expect(balances(account)).toEqual({ available: '0', held: '0', total: '0', locked: true });
    });

    it('should let a dispute drive available negative', () => {
      const deposit = tx('deposit', 1, 1, '100');
      const account = createAccount(1);
      settleTransaction(account, deposit);
      settleTransaction(account, tx('withdrawal', 1, 2, '80'));

      settleTransaction(account, tx('dispute', 1, 1), deposit);

      expect(balances(account)).toEqual({ available: '-80', held: '100', total: '20', locked: false });
      expect(isBalanced(account)).toBe(true);
    });

    it('should apply a resolve that has no preceding dispute', () => {
      const deposit = tx('deposit', 1, 1, '5');
      const account = createAccount(1);
      settleTransaction(account, deposit);

      settleTransaction(account, tx('resolve', 1, 1), deposit);

      expect(balances(account)).toEqual({ available: '10', held: '-5', total: '5', locked: false });
    });

    it('should apply a second dispute of the same transaction', () => {
      const deposit = tx('deposit', 1, 1, '5');
      const account = createAccount(1);
      settleTransaction(account, deposit);

      settleTransaction(account, tx('dispute', 1, 1), deposit);
      settleTransaction(account, tx('dispute', 1, 1), deposit);

      expect(balances(account)).toEqual({ available: '-5', held: '10', total: '5', locked: false });
    });

    it('should use the referenced amount and ignore any amount on the dispute itself', () => {
      const deposit = tx('deposit', 1, 1, '2');
      const account = createAccount(1);
      settleTransaction(account, deposit);

      settleTransaction(account, tx('dispute', 1, 1, '999'), deposit);

      expect(balances(account)).toEqual({ available: '0', held: '2', total: '2', locked: false });
    });

    it('should skip dispute-family records without a reference', () => {
      const account = createAccount(1);

      for (const type of ['dispute', 'resolve', 'chargeback'] as const) {
        expect(settleTransaction(account, tx(type, 1, 1))).toEqual({ status: 'skipped', reason: 'missing-reference' });
      }
      expect(balances(account)).toEqual({ available: '0', held: '0', total: '0', locked: false });
    });

    it('should skip dispute-family records whose reference has no amount', () => {
      const account = createAccount(1);
      const reference = tx('deposit', 1, 1);

      expect(settleTransaction(account, tx('chargeback', 1, 1), reference)).toEqual({
        status: 'skipped',
        reason: 'missing-amount',
      });
      expect(account.locked).toBe(false);
    });
  });

  it('should keep total equal to available plus held across a mixed sequence', () => {
    const account = createAccount(1);
    const d1 = tx('deposit', 1, 1, '10.1234');
    const d2 = tx('deposit', 1, 2, '3.5');
    const w1 = tx('withdrawal', 1, 3, '4.25');

    settleTransaction(account, d1);
    settleTransaction(account, d2);
    settleTransaction(account, w1);
    settleTransaction(account, tx('dispute', 1, 2), d2);
    settleTransaction(account, tx('dispute', 1, 3), w1);
    settleTransaction(account, tx('resolve', 1, 3), w1);
    settleTransaction(account, tx('chargeback', 1, 2), d2);

    expect(isBalanced(account)).toBe(true);
    expect(balances(account)).toEqual({ available: '5.8734', held: '0', total: '5.8734', locked: true });
  });
});
