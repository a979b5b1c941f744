import { err, ok, type Result } from 'neverthrow';

import { ConfigError } from '../errors/index.js';
import { BLOCK_TAGS, type BlockRef, type BlockTag } from '../types/chain.js';

const DECIMAL_HEIGHT = /^\d+$/;
const HEX_HEIGHT = /^0x[0-9a-f]+$/i;

export function isBlockTag(value: string): value is BlockTag {
  return (BLOCK_TAGS as readonly string[]).includes(value);
}

/**
 * Parse a block reference from user input: a tag, a decimal height or a 0x-prefixed hex height.
 */
export function parseBlockRef(input: string): Result<BlockRef, ConfigError> {
  const value = input.trim().toLowerCase();

  if (isBlockTag(value)) {
    return ok(value);
  }

  let height: bigint | undefined;
  if (DECIMAL_HEIGHT.test(value) || HEX_HEIGHT.test(value)) {
    height = BigInt(value);
  }

  if (height === undefined) {
    return err(
      new ConfigError(
        `Invalid block reference "${input}": expected ${BLOCK_TAGS.join(', ')} or a non-negative block height`
      )
    );
  }

  if (height > BigInt(Number.MAX_SAFE_INTEGER)) {
    return err(new ConfigError(`Block height ${height.toString()} is out of range`));
  }

  return ok(Number(height));
}

/**
 * Encode a block reference as a JSON-RPC block parameter (tags as-is, heights as hex quantities).
 */
export function toRpcBlockParam(blockRef: BlockRef): string {
  return typeof blockRef === 'number' ? `0x${blockRef.toString(16)}` : blockRef;
}

export function formatBlockRef(blockRef: BlockRef): string {
  return typeof blockRef === 'number' ? String(blockRef) : blockRef;
}
