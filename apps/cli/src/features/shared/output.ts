import type { LineWriter } from '@soundness/logger';

export type OutputFormat = 'json' | 'text';

/**
 * Where a command writes. The report goes to stdout; logs and text-mode errors to stderr.
 */
export interface CliOutput {
  stdout: LineWriter;
  stderr: LineWriter;
}

export function processOutput(): CliOutput {
  return { stdout: process.stdout, stderr: process.stderr };
}
