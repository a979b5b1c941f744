import type { SourceRef } from '@soundness/core';

import type { AccountComparisonResult, OverallStatus, RunSummary } from '../types/comparison-types.js';

import { countOutcomes } from './outcome-utils.js';

export interface BuildRunSummaryInput {
  results: readonly AccountComparisonResult[];
  sourceA: SourceRef;
  sourceB: SourceRef;
  startedAt: Date;
  finishedAt?: Date | undefined;
}

/**
 * Assemble the immutable summary of a run. The run is OK only when every account matched.
 */
export function buildRunSummary(input: BuildRunSummaryInput): RunSummary {
  const { results, sourceA, sourceB, startedAt, finishedAt } = input;
  const counts = countOutcomes(results);
  const overallStatus: OverallStatus = counts.match === counts.total ? 'OK' : 'MISMATCH';

  return Object.freeze({
    counts,
    elapsedMs: finishedAt ? Math.max(0, finishedAt.getTime() - startedAt.getTime()) : 0,
    overallStatus,
    results: Object.freeze([...results]),
    sourceA,
    sourceB,
    timestamp: startedAt.toISOString(),
  });
}
