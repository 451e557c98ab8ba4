import fs from 'node:fs/promises';

import { TransactionParseError, getErrorMessage } from '@txledger/core';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

/**
 * One decoded CSV record keyed by (trimmed) header name, with the line it ended on.
 */
export interface CsvRow {
  fields: Record<string, string>;
  line: number;
}

// Shape of csv-parse output under `columns: true, info: true`
const ParsedRecordSchema = z.object({
  record: z.record(z.string(), z.string()),
  info: z.object({ lines: z.number().int() }),
});

/**
 * CSV parsing with the preprocessing every ledger input needs:
 * BOM removal, whitespace trimming, blank-line skipping and short rows allowed
 * (dispute-family records often omit the trailing amount column).
 */
export class CsvParser {
  static parseContent(content: string): Result<CsvRow[], TransactionParseError> {
    let parsed: unknown;
    try {
      parsed = parse(content, {
        bom: true,
        columns: true,
        info: true,
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true,
      });
    } catch (error) {
      return err(new TransactionParseError(`Malformed CSV: ${getErrorMessage(error)}`));
    }

    if (!Array.isArray(parsed)) {
      return err(new TransactionParseError('Malformed CSV: parser returned no records'));
    }

    const rows: CsvRow[] = [];
    for (const entry of parsed) {
      const result = ParsedRecordSchema.safeParse(entry);
      if (!result.success) {
        return err(new TransactionParseError('Malformed CSV: unexpected record shape'));
      }
      rows.push({ fields: result.data.record, line: result.data.info.lines });
    }
    return ok(rows);
  }

  static async parseFile(filePath: string): Promise<Result<CsvRow[], TransactionParseError>> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      return err(new TransactionParseError(`Cannot read ${filePath}: ${getErrorMessage(error)}`));
    }
    return CsvParser.parseContent(content);
  }
}
