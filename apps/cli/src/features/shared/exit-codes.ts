/**
 * Exit codes of the CLI.
 */
export const ExitCodes = {
  /** Every account matched */
  SUCCESS: 0,

  /** Invalid arguments or configuration, or an endpoint failed the preflight check */
  GENERAL_ERROR: 1,

  /** At least one account differs or could not be read */
  MISMATCH: 2,

  /** Interrupted by SIGINT (128 + signal number) */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
