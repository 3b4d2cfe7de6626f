import { isGeohashError } from '@geohashing/core';

import { exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  INVALID_COORDINATE: 'Coordinates are decimal degrees, e.g. geohash 37.421542 -122.085589',
  INVALID_DATE_FORMAT: 'Pass the date as --date YYYY-MM-DD, e.g. --date 2005-05-26',
  MISSING_COORDINATE: 'Pass both latitude and longitude, or use --global for the globalhash.',
  SOURCE_UNAVAILABLE: 'Supply the Dow Jones opening value yourself with --dow-jones <value>.',
};

/**
 * Usage error raised at the command boundary (bad option values).
 */
export class InvalidArgumentsError extends Error {
  readonly code = 'INVALID_ARGS';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentsError';
  }
}

/**
 * Machine-readable code for an error: the domain code when it has one,
 * otherwise the code of the exit status.
 */
export function resolveErrorCode(error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): string {
  if (isGeohashError(error) || error instanceof InvalidArgumentsError) {
    return error.code;
  }
  return exitCodeToErrorCode(exitCode);
}

export function getErrorTip(code: string): string | undefined {
  return Object.hasOwn(ERROR_TIPS, code) ? ERROR_TIPS[code] : undefined;
}
