#!/usr/bin/env node
import { getErrorMessage } from '@geohashing/core';
import { Command } from 'commander';

import { registerGeohashCommand } from './features/geohash/geohash.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const program = new Command();

async function main() {
  program
    .name('geohash')
    .description('Calculate geohashes as defined by Randall Munroe in xkcd #426.')
    .version('1.0.0');

  registerGeohashCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  process.stderr.write(`Unexpected error: ${getErrorMessage(error)}\n`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
