/**
 * Exit codes for the CLI. Every failure exits with 1; the error code in the
 * response says what went wrong.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** Any failure (bad arguments, unreachable sources, invalid input) */
  GENERAL_ERROR: 1,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
