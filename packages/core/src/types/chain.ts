export const BLOCK_TAGS = ['latest', 'earliest', 'pending', 'safe', 'finalized'] as const;

export type BlockTag = (typeof BLOCK_TAGS)[number];

/**
 * Named block tag or a non-negative block height.
 */
export type BlockRef = BlockTag | number;

export type SourceLabel = 'A' | 'B';

/**
 * One side of a comparison: an endpoint observed at a block.
 */
export interface SourceRef {
  readonly endpoint: string;
  readonly blockRef: BlockRef;
  readonly label: SourceLabel;
}

/**
 * Balance (native units) and nonce of one account as seen by one source.
 */
export interface AccountState {
  readonly address: string;
  readonly balance: bigint;
  readonly nonce: number;
}

export function createSourceRef(label: SourceLabel, endpoint: string, blockRef: BlockRef = 'latest'): SourceRef {
  return Object.freeze({ blockRef, endpoint, label });
}

export function createAccountState(address: string, balance: bigint, nonce: number): AccountState {
  return Object.freeze({ address, balance, nonce });
}
