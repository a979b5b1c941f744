import { err, ok, type Result } from 'neverthrow';
import { getAddress } from 'viem';

import { ConfigError } from '../errors/index.js';

const HEX_ADDRESS = /^0x[0-9a-fA-F]{40}$/;

/**
 * An address is valid when it is 20 hex bytes; mixed-case input must also carry a valid EIP-55 checksum.
 */
export function isValidEvmAddress(address: string): boolean {
  if (!HEX_ADDRESS.test(address)) {
    return false;
  }

  const body = address.slice(2);
  const isMixedCase = body !== body.toLowerCase() && body !== body.toUpperCase();
  if (!isMixedCase) {
    return true;
  }

  return getAddress(address) === address;
}

/**
 * Validate and convert an address to its EIP-55 checksum form.
 */
export function normalizeEvmAddress(address: string): Result<string, ConfigError> {
  const trimmed = address.trim();
  if (!isValidEvmAddress(trimmed)) {
    return err(new ConfigError(`Invalid address: ${address}`));
  }
  return ok(getAddress(trimmed.toLowerCase()));
}

/**
 * Shorten an address for log lines.
 */
export function maskAddress(address: string | null | undefined): string {
  if (!address || address.length <= 12) return address || '';
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}
