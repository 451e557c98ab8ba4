#!/usr/bin/env node
import { toError } from '@txledger/core';
import { flushLoggers } from '@txledger/logger';
import { Command } from 'commander';

import { registerReplayCommand } from './features/replay/replay.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const CLI_VERSION = '0.1.0';

const program = new Command();

async function main() {
  program
    .name('txledger')
    .description('Replay a CSV log of client transactions into final account balances')
    .version(CLI_VERSION);

  registerReplayCommand(program);

  await program.parseAsync();
  flushLoggers();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  displayCliError(toError(reason), ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  displayCliError(toError(error), ExitCodes.GENERAL_ERROR);
});
