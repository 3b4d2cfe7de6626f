import { isDevelopment } from '@geohashing/env';
import { flushLoggers } from '@geohashing/logger';
import pc from 'picocolors';

import { getErrorTip, resolveErrorCode } from './cli-error.js';
import { createErrorResponse, createSuccessResponse, type ResponseMetadata } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

/**
 * OutputManager handles formatting and displaying CLI output.
 * Results go to stdout; text-mode errors go to stderr.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: ResponseMetadata): void {
    if (this.format === 'json') {
      const duration_ms = Date.now() - this.startTime;
      const response = createSuccessResponse(command, data, {
        duration_ms,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Print plain text (only in text mode).
   */
  log(message: string): void {
    if (this.format === 'text') {
      console.log(message);
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const code = resolveErrorCode(error, exitCode);

    if (this.format === 'json') {
      // JSON errors go to stdout so callers can parse the response
      const response = createErrorResponse(command, error, code, isDevelopment());
      console.log(JSON.stringify(response, undefined, 2));
    } else {
      this.displayTextError(error, code);
    }

    flushLoggers();
    process.exit(exitCode);
  }

  private displayTextError(error: Error, code: string): void {
    process.stderr.write(`${pc.red('✗')} Error: ${error.message}\n`);

    const tip = getErrorTip(code);
    if (tip) {
      process.stderr.write(`${pc.dim(tip)}\n`);
    }

    if (isDevelopment() && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n`);
    }
  }
}
