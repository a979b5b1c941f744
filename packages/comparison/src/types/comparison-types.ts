import type { AccountState, FetchError, SourceRef } from '@soundness/core';

export type ComparisonOutcome = 'MATCH' | 'MISMATCH_BALANCE' | 'MISMATCH_NONCE' | 'MISMATCH_BOTH' | 'FETCH_ERROR';

/**
 * What one source returned for one account.
 */
export type FetchOutcome = { ok: true; state: AccountState } | { ok: false; error: FetchError };

export interface AccountComparisonResult {
  readonly address: string;
  readonly stateA: FetchOutcome;
  readonly stateB: FetchOutcome;
  readonly outcome: ComparisonOutcome;
}

export type OverallStatus = 'OK' | 'MISMATCH';

export interface RunCounts {
  readonly total: number;
  readonly match: number;
  readonly mismatch: number;
  readonly fetchError: number;
}

export interface RunSummary {
  readonly sourceA: SourceRef;
  readonly sourceB: SourceRef;
  /** Same order as the input addresses, duplicates included. */
  readonly results: readonly AccountComparisonResult[];
  /** ISO-8601 UTC instant captured once, before the first fetch. */
  readonly timestamp: string;
  readonly overallStatus: OverallStatus;
  readonly counts: RunCounts;
  readonly elapsedMs: number;
}
