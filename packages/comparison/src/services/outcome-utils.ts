import type { AccountComparisonResult, ComparisonOutcome, FetchOutcome, RunCounts } from '../types/comparison-types.js';

/**
 * Pure classification of one account: FETCH_ERROR if either side failed, otherwise which of
 * balance and nonce differ. Equality is exact.
 */
export function classifyOutcome(stateA: FetchOutcome, stateB: FetchOutcome): ComparisonOutcome {
  if (!stateA.ok || !stateB.ok) {
    return 'FETCH_ERROR';
  }

  const balanceDiffers = stateA.state.balance !== stateB.state.balance;
  const nonceDiffers = stateA.state.nonce !== stateB.state.nonce;

  if (balanceDiffers && nonceDiffers) return 'MISMATCH_BOTH';
  if (balanceDiffers) return 'MISMATCH_BALANCE';
  if (nonceDiffers) return 'MISMATCH_NONCE';
  return 'MATCH';
}

export function createComparisonResult(
  address: string,
  stateA: FetchOutcome,
  stateB: FetchOutcome
): AccountComparisonResult {
  return Object.freeze({ address, outcome: classifyOutcome(stateA, stateB), stateA, stateB });
}

export function countOutcomes(results: readonly AccountComparisonResult[]): RunCounts {
  let match = 0;
  let mismatch = 0;
  let fetchError = 0;

  for (const result of results) {
    if (result.outcome === 'MATCH') match++;
    else if (result.outcome === 'FETCH_ERROR') fetchError++;
    else mismatch++;
  }

  return Object.freeze({ fetchError, match, mismatch, total: results.length });
}
