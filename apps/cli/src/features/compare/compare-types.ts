import type { RunSummary } from '@soundness/comparison';
import { DomainError, type SourceRef } from '@soundness/core';

import type { ExitCode } from '../shared/exit-codes.js';
import type { OutputFormat } from '../shared/output.js';

/**
 * Fully resolved settings for one compare run. Built once from flags and environment.
 */
export interface CompareConfig {
  sourceA: SourceRef;
  sourceB: SourceRef;
  /** Checksummed, in input order, duplicates kept. */
  addresses: string[];
  timeoutMs: number;
  /** Attempts per HTTP request. */
  retries: number;
  maxConcurrency: number;
  batch: boolean;
  preflight: boolean;
  format: OutputFormat;
  color: boolean;
  verbose: boolean;
}

export interface CompareCommandResult {
  summary: RunSummary;
  exitCode: ExitCode;
}

/**
 * An endpoint did not answer the connectivity probe made before comparing.
 */
export class PreflightError extends DomainError {
  readonly code = 'PREFLIGHT_FAILED';
  readonly severity = 'error' as const;
}
