import type { ChainReader } from '@soundness/chain-reader';
import {
  CancelledError,
  ConfigError,
  FetchError,
  formatBlockRef,
  getErrorMessage,
  mapWithConcurrency,
  maskAddress,
  type SourceRef,
} from '@soundness/core';
import { getLogger } from '@soundness/logger';
import { err, ok, type Result } from 'neverthrow';

import type { AccountComparisonResult, FetchOutcome, RunSummary } from '../types/comparison-types.js';

import { createComparisonResult } from './outcome-utils.js';
import { buildRunSummary } from './report-builder.js';

export const DEFAULT_MAX_CONCURRENCY = 8;

export interface AccountComparatorOptions {
  /** Upper bound on reads in flight across both sources; each read holds one HTTP request at a time. */
  maxConcurrency?: number | undefined;
  clock?: (() => Date) | undefined;
}

export interface CompareOptions {
  signal?: AbortSignal | undefined;
}

interface SideTask {
  address: string;
  reader: ChainReader;
  source: SourceRef;
}

/**
 * Reads every account from both sources and classifies each pair.
 *
 * Each (address, source) read is its own task, so one slow or failing endpoint only affects the
 * accounts it serves. Failed reads are recorded as FETCH_ERROR results; only cancellation ends
 * a run without a summary.
 */
export class AccountComparator {
  private readonly logger = getLogger('AccountComparator');
  private readonly maxConcurrency: number;
  private readonly clock: () => Date;

  constructor(
    private readonly readerA: ChainReader,
    private readonly readerB: ChainReader,
    options: AccountComparatorOptions = {}
  ) {
    this.maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    this.clock = options.clock ?? (() => new Date());

    if (!Number.isInteger(this.maxConcurrency) || this.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${this.maxConcurrency}`);
    }
  }

  async compare(
    sourceA: SourceRef,
    sourceB: SourceRef,
    addresses: readonly string[],
    options: CompareOptions = {}
  ): Promise<Result<RunSummary, ConfigError | CancelledError>> {
    if (addresses.length === 0) {
      return err(new ConfigError('At least one address is required'));
    }

    const startedAt = this.clock();
    this.logger.info(
      `Comparing ${addresses.length} account(s) - A: ${formatBlockRef(sourceA.blockRef)}, B: ${formatBlockRef(sourceB.blockRef)}, Concurrency: ${this.maxConcurrency}`
    );

    // Interleaved A/B per address: task 2i reads side A of address i, task 2i+1 side B
    const tasks: SideTask[] = addresses.flatMap((address) => [
      { address, reader: this.readerA, source: sourceA },
      { address, reader: this.readerB, source: sourceB },
    ]);

    let completed = 0;
    const fetched = await mapWithConcurrency(
      tasks,
      this.maxConcurrency,
      async (task) => {
        const outcome = await this.fetchSide(task, options.signal);
        completed++;
        this.logger.debug(
          `Fetched ${completed}/${tasks.length} - Source: ${task.source.label}, Address: ${maskAddress(task.address)}, Result: ${outcome.ok ? 'ok' : outcome.error.kind}`
        );
        return outcome;
      },
      options.signal
    );

    if (fetched.isErr()) {
      this.logger.warn(`Comparison cancelled after ${completed}/${tasks.length} fetches`);
      return err(fetched.error);
    }

    const results = pairOutcomes(addresses, fetched.value);
    const summary = buildRunSummary({ finishedAt: this.clock(), results, sourceA, sourceB, startedAt });

    this.logger.info(
      `Comparison finished - Status: ${summary.overallStatus}, Match: ${summary.counts.match}, Mismatch: ${summary.counts.mismatch}, FetchError: ${summary.counts.fetchError}, ElapsedMs: ${summary.elapsedMs}`
    );

    return ok(summary);
  }

  private async fetchSide(task: SideTask, signal: AbortSignal | undefined): Promise<FetchOutcome> {
    try {
      const result = await task.reader.fetchAccountState(task.address, task.source.blockRef, { signal });
      return result.isOk() ? { ok: true, state: result.value } : { error: result.error, ok: false };
    } catch (error) {
      // Readers report failures as values; anything thrown is still confined to this account
      return { error: new FetchError('NETWORK_ERROR', getErrorMessage(error)), ok: false };
    }
  }
}

function pairOutcomes(addresses: readonly string[], outcomes: readonly FetchOutcome[]): AccountComparisonResult[] {
  return addresses.map((address, index) => {
    const stateA = outcomes[index * 2];
    const stateB = outcomes[index * 2 + 1];
    if (!stateA || !stateB) {
      throw new Error(`Missing fetch outcome for account #${index}`);
    }
    return createComparisonResult(address, stateA, stateB);
  });
}
