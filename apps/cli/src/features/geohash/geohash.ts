// Geohash command - compute the xkcd #426 geohash, globalhash or centicule

import { flushLoggers } from '@geohashing/logger';
import { Option, type Command } from 'commander';
import type { Result } from 'neverthrow';

import { InvalidArgumentsError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { setupCliLogger } from '../shared/logger-setup.js';
import { OutputManager } from '../shared/output.js';
import { COMPLIANCE_CHOICES, GeohashCommandOptionsSchema, type GeohashCommandOptions } from '../shared/schemas.js';

import { GeohashHandler, type GeohashHandlerOptions, type GeohashReport } from './geohash-handler.js';
import {
  buildGeohashParams,
  formatReportOutput,
  formatSimpleOutput,
  toGeohashReportData,
  type GeohashArguments,
} from './geohash-utils.js';

const COMMAND_NAME = 'geohash';

/**
 * Command options (validated at CLI boundary).
 */
export type CommandOptions = GeohashCommandOptions;

/**
 * Register the geohash arguments and options on the root program
 */
export function registerGeohashCommand(program: Command, handlerOptions?: GeohashHandlerOptions): void {
  program
    .argument('[latitude]', 'Latitude in decimal degrees')
    .argument('[longitude]', 'Longitude in decimal degrees')
    .option('-d, --date <YYYY-MM-DD>', 'The geohash date. The current date is used otherwise.')
    .option(
      '-j, --dow-jones <value>',
      'The Dow Jones opening value, with two decimal places. The most recent compliant value is fetched otherwise.'
    )
    .addOption(new Option('--dj <value>', 'Alias for --dow-jones').hideHelp())
    .addOption(
      new Option('--30w <compliance>', 'Override automatic 30W detection, forcing either east or west.').choices(
        COMPLIANCE_CHOICES
      )
    )
    .option('-g, --global', 'Calculate the globalhash instead. Latitude and longitude are ignored.')
    .option('-s, --simple', 'Only print latitude and longitude, separated by a newline.')
    .option('--centicule', 'Narrow the hash to the centicule of the given coordinate.')
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Log source lookups to stderr')
    .action(async (latitude: string | undefined, longitude: string | undefined, rawOptions: unknown) => {
      await executeGeohashCommand({ latitude, longitude }, rawOptions, handlerOptions);
    });
}

/**
 * Execute the geohash command.
 */
export async function executeGeohashCommand(
  args: GeohashArguments,
  rawOptions: unknown,
  handlerOptions?: GeohashHandlerOptions
): Promise<void> {
  // Validate options at CLI boundary
  const parseResult = GeohashCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error(
      COMMAND_NAME,
      new InvalidArgumentsError(parseResult.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.GENERAL_ERROR
    );
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');
  setupCliLogger(options.verbose);

  const params = buildGeohashParams(args, options);
  if (params.isErr()) {
    output.error(COMMAND_NAME, params.error, ExitCodes.GENERAL_ERROR);
    return;
  }

  const handler = new GeohashHandler(handlerOptions);
  let result: Result<GeohashReport, Error>;
  try {
    result = await handler.execute(params.value);
  } finally {
    await handler.destroy();
  }

  if (result.isErr()) {
    output.error(COMMAND_NAME, result.error, ExitCodes.GENERAL_ERROR);
    return;
  }

  const report = result.value;
  if (output.isJsonMode()) {
    output.json(COMMAND_NAME, toGeohashReportData(report));
  } else if (options.simple) {
    output.log(formatSimpleOutput(report.coordinate));
  } else {
    output.log(formatReportOutput(report));
  }
  flushLoggers();
}
