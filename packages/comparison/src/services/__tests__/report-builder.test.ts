import { createAccountState, createSourceRef, FetchError } from '@soundness/core';
import { describe, expect, it } from 'vitest';

import { createComparisonResult } from '../outcome-utils.js';
import { buildRunSummary } from '../report-builder.js';

const ADDRESS = '0x1111111111111111111111111111111111111111';
const sourceA = createSourceRef('A', 'http://a.example', 'latest');
const sourceB = createSourceRef('B', 'http://b.example', 100);
const startedAt = new Date('2024-01-01T00:00:00.000Z');

const match = createComparisonResult(
  ADDRESS,
  { ok: true, state: createAccountState(ADDRESS, 1n, 1) },
  { ok: true, state: createAccountState(ADDRESS, 1n, 1) }
);
const fetchError = createComparisonResult(
  ADDRESS,
  { ok: true, state: createAccountState(ADDRESS, 1n, 1) },
  { error: new FetchError('CONNECTION_REFUSED', 'Connection refused'), ok: false }
);

describe('buildRunSummary', () => {
  it('is OK when every account matched', () => {
    const summary = buildRunSummary({ results: [match, match], sourceA, sourceB, startedAt });

    expect(summary.overallStatus).toBe('OK');
    expect(summary.counts).toEqual({ fetchError: 0, match: 2, mismatch: 0, total: 2 });
  });

  it('is MISMATCH when any account failed to fetch', () => {
    const summary = buildRunSummary({ results: [match, fetchError], sourceA, sourceB, startedAt });

    expect(summary.overallStatus).toBe('MISMATCH');
    expect(summary.counts.fetchError).toBe(1);
  });

  it('records the start instant and elapsed time', () => {
    const summary = buildRunSummary({
      finishedAt: new Date('2024-01-01T00:00:02.250Z'),
      results: [match],
      sourceA,
      sourceB,
      startedAt,
    });

    expect(summary.timestamp).toBe('2024-01-01T00:00:00.000Z');
    expect(summary.elapsedMs).toBe(2250);
  });

  it('defaults elapsed time to zero without a finish instant', () => {
    expect(buildRunSummary({ results: [match], sourceA, sourceB, startedAt }).elapsedMs).toBe(0);
  });

  it('freezes the summary and its result list', () => {
    const results = [match];
    const summary = buildRunSummary({ results, sourceA, sourceB, startedAt });
    results.push(fetchError);

    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.results)).toBe(true);
    expect(summary.results).toHaveLength(1);
  });
});
