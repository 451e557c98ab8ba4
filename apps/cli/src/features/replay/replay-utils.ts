// Pure helpers for the replay command: option mapping and snapshot encoding

import { ConfigurationError, formatAmount, type Account } from '@txledger/core';
import type { LockedAccountPolicy } from '@txledger/ledger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { OutputFormat, ReplayCommandOptions } from '../shared/schemas.js';

/**
 * Replay handler parameters.
 */
export interface ReplayHandlerParams {
  /** Path of the CSV transaction log */
  inputPath: string;

  format: OutputFormat;

  lockedAccountPolicy: LockedAccountPolicy;

  /** Per-record requeue limit for dispute-family records; unbounded when absent */
  maxDeferrals?: number | undefined;
}

export const CSV_HEADERS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Build handler parameters from the positional argument and validated flags.
 */
export function buildReplayParamsFromFlags(
  inputPath: string | undefined,
  options: ReplayCommandOptions
): Result<ReplayHandlerParams, ConfigurationError> {
  if (inputPath === undefined || inputPath.trim() === '') {
    return err(new ConfigurationError('No transactions file provided, please specify a transaction file.'));
  }

  return ok({
    inputPath,
    format: options.format,
    lockedAccountPolicy: options.lockedPolicy,
    maxDeferrals: options.maxDeferrals,
  });
}

function sortByClient(accounts: Iterable<Account>): Account[] {
  return [...accounts].sort((a, b) => a.clientId - b.clientId);
}

/**
 * Encode the final snapshot as CSV, one row per client in ascending client id.
 */
export function formatAccountsCsv(accounts: Iterable<Account>): string {
  const lines = [CSV_HEADERS.join(',')];

  for (const account of sortByClient(accounts)) {
    lines.push(
      [
        String(account.clientId),
        formatAmount(account.available),
        formatAmount(account.held),
        formatAmount(account.total),
        String(account.locked),
      ].join(',')
    );
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Human-readable snapshot, one block per client.
 */
export function formatAccountsText(accounts: Iterable<Account>): string {
  return sortByClient(accounts)
    .map((account) =>
      [
        `id: ${account.clientId}`,
        `funds available: ${formatAmount(account.available)}`,
        `funds held: ${formatAmount(account.held)}`,
        `funds total: ${formatAmount(account.total)}`,
        `locked: ${String(account.locked)}`,
      ]
        .map((line) => `${line}\n`)
        .join('')
    )
    .join('\n');
}

export function formatAccounts(accounts: Iterable<Account>, format: OutputFormat): string {
  return format === 'csv' ? formatAccountsCsv(accounts) : formatAccountsText(accounts);
}
