import type { ChainInfo, ChainReader } from '@soundness/chain-reader';
import { AccountComparator } from '@soundness/comparison';
import { CancelledError, type ConfigError, type FetchError, type SourceRef } from '@soundness/core';
import { sanitizeUrl } from '@soundness/http';
import { getLogger } from '@soundness/logger';
import { err, ok, type Result } from 'neverthrow';

import { ExitCodes } from '../shared/exit-codes.js';

import { PreflightError, type CompareCommandResult, type CompareConfig } from './compare-types.js';

export type CompareHandlerError = ConfigError | PreflightError | CancelledError;

export interface CompareHandlerOptions {
  clock?: (() => Date) | undefined;
}

/**
 * Compare handler: optional connectivity preflight, then one comparator run.
 * Owns no resources; the command closes the readers.
 */
export class CompareHandler {
  private readonly logger = getLogger('CompareHandler');

  constructor(
    private readonly readerA: ChainReader,
    private readonly readerB: ChainReader,
    private readonly options: CompareHandlerOptions = {}
  ) {}

  async execute(
    config: CompareConfig,
    signal?: AbortSignal
  ): Promise<Result<CompareCommandResult, CompareHandlerError>> {
    if (config.preflight) {
      const preflight = await this.preflight(config, signal);
      if (preflight.isErr()) {
        return err(preflight.error);
      }
    }

    const comparator = new AccountComparator(this.readerA, this.readerB, {
      clock: this.options.clock,
      maxConcurrency: config.maxConcurrency,
    });
    const result = await comparator.compare(config.sourceA, config.sourceB, config.addresses, { signal });

    return result.map((summary) => ({
      exitCode: summary.overallStatus === 'OK' ? ExitCodes.SUCCESS : ExitCodes.MISMATCH,
      summary,
    }));
  }

  /**
   * Probe both endpoints before any account is read. A different chain id on each side is
   * reported but allowed, since comparing two chains is a valid use.
   */
  private async preflight(
    config: CompareConfig,
    signal: AbortSignal | undefined
  ): Promise<Result<void, PreflightError | CancelledError>> {
    // Probes count against the same in-flight bound as the comparison
    let probes: [Result<ChainInfo, FetchError>, Result<ChainInfo, FetchError>];
    if (config.maxConcurrency > 1) {
      probes = await Promise.all([this.readerA.probe({ signal }), this.readerB.probe({ signal })]);
    } else {
      probes = [await this.readerA.probe({ signal }), await this.readerB.probe({ signal })];
    }
    const [probeA, probeB] = probes;
    if (signal?.aborted) {
      return err(new CancelledError('Operation cancelled'));
    }

    const infoA = this.checkProbe(config.sourceA, probeA);
    if (infoA.isErr()) {
      return err(infoA.error);
    }
    const infoB = this.checkProbe(config.sourceB, probeB);
    if (infoB.isErr()) {
      return err(infoB.error);
    }

    if (infoA.value.chainId !== infoB.value.chainId) {
      this.logger.warn(
        `Sources report different chain ids - A: ${infoA.value.chainId.toString()}, B: ${infoB.value.chainId.toString()}`
      );
    }

    return ok(undefined);
  }

  private checkProbe(source: SourceRef, probe: Result<ChainInfo, FetchError>): Result<ChainInfo, PreflightError> {
    if (probe.isErr()) {
      return err(
        new PreflightError(`Source ${source.label} (${sanitizeUrl(source.endpoint)}) is unreachable: ${probe.error.message}`, {
          kind: probe.error.kind,
          source: source.label,
        })
      );
    }

    const info = probe.value;
    this.logger.info(
      `Source ${source.label} reachable - ChainId: ${info.chainId.toString()}, LatestBlock: ${info.latestBlock.toString()}`
    );

    if (typeof source.blockRef === 'number' && BigInt(source.blockRef) > info.latestBlock) {
      this.logger.warn(
        `Source ${source.label} block ${source.blockRef} is ahead of its latest block ${info.latestBlock.toString()}`
      );
    }

    return ok(info);
  }
}
