import type { ExitCode } from './exit-codes.js';

/**
 * Error envelope printed on stdout when a command fails in JSON mode.
 */
export interface CLIErrorResponse {
  /** Always false; successful runs print the report itself */
  success: false;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  error: {
    /** Machine-readable error code */
    code: string;

    /** Additional error details (optional) */
    details?: unknown;

    /** Human-readable error message */
    message: string;

    /** Stack trace (only in development mode) */
    stack?: string | undefined;
  };
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIErrorResponse {
  const errorObj: CLIErrorResponse['error'] = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'MISMATCH',
    130: 'CANCELLED',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
