import { TransactionParseError, TransactionRecordSchema, type Transaction } from '@txledger/core';
import { getLogger } from '@txledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { CsvParser, type CsvRow } from './csv-parser.js';

const logger = getLogger('TransactionCsvReader');

/**
 * Validate decoded rows into transactions, stopping at the first bad record.
 */
export function decodeTransactions(rows: readonly CsvRow[]): Result<Transaction[], TransactionParseError> {
  const transactions: Transaction[] = [];

  for (const row of rows) {
    const result = TransactionRecordSchema.safeParse(row.fields);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      return err(new TransactionParseError(`Invalid transaction record (${issues})`, row.line, { fields: row.fields }));
    }
    transactions.push(result.data);
  }

  return ok(transactions);
}

export function parseTransactionsCsv(content: string): Result<Transaction[], TransactionParseError> {
  return CsvParser.parseContent(content).andThen(decodeTransactions);
}

/**
 * Read a transaction log from disk. Any read, CSV or record error fails the whole file.
 */
export async function readTransactions(filePath: string): Promise<Result<Transaction[], TransactionParseError>> {
  logger.debug({ filePath }, 'Reading transaction log');

  const rowsResult = await CsvParser.parseFile(filePath);
  if (rowsResult.isErr()) {
    return err(rowsResult.error);
  }

  const transactionsResult = decodeTransactions(rowsResult.value);
  if (transactionsResult.isOk()) {
    logger.info({ filePath, count: transactionsResult.value.length }, 'Loaded transactions');
  }
  return transactionsResult;
}
