import { DomainError } from '@soundness/core';
import pc from 'picocolors';

import { createErrorResponse, exitCodeToErrorCode } from './cli-response.js';
import type { ExitCode } from './exit-codes.js';
import type { CliOutput, OutputFormat } from './output.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  CONFIG_ERROR: 'Check your command arguments and try again. Run with --help for usage information.',
  PREFLIGHT_FAILED: 'Check that both RPC endpoints are reachable, or pass --no-preflight to compare anyway.',
};

export interface DisplayCliErrorOptions {
  format: OutputFormat;
  output: CliOutput;
  color?: boolean | undefined;
}

/**
 * Display a CLI error.
 *
 * - Text mode: formatted error to stderr with contextual tips
 * - JSON mode: structured JSON error to stdout
 *
 * Domain errors report their own code; anything else is named after the exit code.
 */
export function displayCliError(
  command: string,
  error: Error,
  exitCode: ExitCode,
  options: DisplayCliErrorOptions
): void {
  const code = error instanceof DomainError ? error.code : exitCodeToErrorCode(exitCode);
  const details = error instanceof DomainError ? error.context : undefined;

  if (options.format === 'json') {
    options.output.stdout.write(`${JSON.stringify(createErrorResponse(command, error, code, details), undefined, 2)}\n`);
    return;
  }

  const colors = pc.createColors(options.color ?? false);
  options.output.stderr.write(`\n${colors.red('✗')} Error: ${error.message}\n`);

  const tip = ERROR_TIPS[code];
  if (tip) {
    options.output.stderr.write(`\n${colors.dim(tip)}\n`);
  }

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    options.output.stderr.write(`\n${colors.dim(error.stack)}\n\n`);
  }
}
