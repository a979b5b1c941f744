import type { BlockRef } from '@soundness/core';

import type {
  ComparisonOutcome,
  FetchOutcome,
  OverallStatus,
  RunCounts,
  RunSummary,
} from '../types/comparison-types.js';

import type { ReportRenderer } from './report-renderer.js';

export interface JsonReportError {
  kind: string;
  message: string;
}

export interface JsonReportAccount {
  address: string;
  balanceA: string | null;
  balanceB: string | null;
  nonceA: number | null;
  nonceB: number | null;
  outcome: ComparisonOutcome;
  errorA: JsonReportError | null;
  errorB: JsonReportError | null;
}

/**
 * Stable machine-readable report. Balances are decimal strings so no precision is lost.
 */
export interface JsonReport {
  sourceA: string;
  sourceB: string;
  blockA: BlockRef;
  blockB: BlockRef;
  timestamp: string;
  accounts: JsonReportAccount[];
  overallStatus: OverallStatus;
  summary: RunCounts;
  elapsedSeconds: number;
}

export class JsonReportRenderer implements ReportRenderer {
  render(summary: RunSummary): string {
    return JSON.stringify(toJsonReport(summary), null, 2);
  }
}

export function toJsonReport(summary: RunSummary): JsonReport {
  return {
    sourceA: summary.sourceA.endpoint,
    sourceB: summary.sourceB.endpoint,
    blockA: summary.sourceA.blockRef,
    blockB: summary.sourceB.blockRef,
    timestamp: summary.timestamp,
    accounts: summary.results.map((result) => ({
      address: result.address,
      balanceA: balanceOf(result.stateA),
      balanceB: balanceOf(result.stateB),
      nonceA: nonceOf(result.stateA),
      nonceB: nonceOf(result.stateB),
      outcome: result.outcome,
      errorA: errorOf(result.stateA),
      errorB: errorOf(result.stateB),
    })),
    overallStatus: summary.overallStatus,
    summary: {
      total: summary.counts.total,
      match: summary.counts.match,
      mismatch: summary.counts.mismatch,
      fetchError: summary.counts.fetchError,
    },
    elapsedSeconds: Math.round(summary.elapsedMs) / 1000,
  };
}

function balanceOf(outcome: FetchOutcome): string | null {
  return outcome.ok ? outcome.state.balance.toString() : null;
}

function nonceOf(outcome: FetchOutcome): number | null {
  return outcome.ok ? outcome.state.nonce : null;
}

function errorOf(outcome: FetchOutcome): JsonReportError | null {
  return outcome.ok ? null : { kind: outcome.error.kind, message: outcome.error.message };
}
