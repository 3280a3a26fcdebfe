#!/usr/bin/env node
import { getLogger } from '@ledgerfold/logger';
import { Command, CommanderError } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('ledgerfold')
    .description('Fold a CSV file of client transactions into final account balances')
    .version('0.1.0')
    .exitOverride();

  registerProcessCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Commander already printed usage or the parse error to stderr
    exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
  }
  logger.error({ error }, 'Unexpected CLI failure');
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
