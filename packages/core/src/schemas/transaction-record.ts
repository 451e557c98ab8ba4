import { z } from 'zod';

import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_TYPES, type Transaction } from '../types/transaction.js';
import { parseAmount } from '../utils/decimal-utils.js';

/**
 * Non-negative decimal integer field bounded by `max`, transformed to number.
 */
export function boundedIdSchema(field: string, max: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${field} must be a non-negative integer`)
    .transform((val) => Number(val))
    .pipe(z.number().int().max(max, `${field} must not exceed ${max}`));
}

export const TransactionTypeSchema = z
  .string()
  .transform((val) => val.trim().toLowerCase())
  .pipe(z.enum(TRANSACTION_TYPES));

// Blank or unparseable amounts mean "absent" rather than a bad record
export const OptionalAmountSchema = z
  .string()
  .optional()
  .transform((val) => parseAmount(val));

/**
 * One row of the transaction log as decoded by the CSV reader.
 */
export const TransactionRecordSchema = z
  .object({
    type: TransactionTypeSchema,
    client: boundedIdSchema('client', MAX_CLIENT_ID),
    tx: boundedIdSchema('tx', MAX_TX_ID),
    amount: OptionalAmountSchema,
  })
  .transform(
    (row): Transaction => ({
      type: row.type,
      clientId: row.client,
      txId: row.tx,
      amount: row.amount,
    })
  );
