import { getConfiguredLogLevel } from '@geohashing/env';
import { ConsoleSink, initLogger, type LogLevel } from '@geohashing/logger';
import pc from 'picocolors';

const DEFAULT_CLI_LOG_LEVEL: LogLevel = 'warn';

/**
 * --verbose wins, then GEOHASH_LOG_LEVEL, then warn
 */
export function resolveCliLogLevel(verbose: boolean | undefined, configured: LogLevel | undefined): LogLevel {
  if (verbose) {
    return 'debug';
  }
  return configured ?? DEFAULT_CLI_LOG_LEVEL;
}

/**
 * Route diagnostics to stderr so stdout carries only results
 */
export function setupCliLogger(verbose: boolean | undefined): void {
  initLogger({
    level: resolveCliLogLevel(verbose, getConfiguredLogLevel()),
    sinks: [new ConsoleSink({ color: pc.isColorSupported })],
  });
}
