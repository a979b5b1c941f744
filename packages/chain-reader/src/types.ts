import type { AccountState, BlockRef, FetchError } from '@soundness/core';
import type { Result } from 'neverthrow';

export interface FetchOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Identity and head of the chain behind an endpoint, as reported by the endpoint itself.
 */
export interface ChainInfo {
  chainId: bigint;
  latestBlock: bigint;
}

/**
 * Read-only access to account state on one endpoint.
 *
 * Implementations never throw for network or protocol failures; every failure is a FetchError
 * whose `kind` says what went wrong. A nonexistent account is not a failure: it reads as
 * balance 0 and nonce 0.
 */
export interface ChainReader {
  fetchAccountState(address: string, blockRef: BlockRef, options?: FetchOptions): Promise<Result<AccountState, FetchError>>;

  /** Cheap connectivity check run before a comparison. */
  probe(options?: FetchOptions): Promise<Result<ChainInfo, FetchError>>;

  /** Release pooled connections. Safe to call more than once. */
  close(): Promise<void>;
}
