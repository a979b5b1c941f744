import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../errors/index.js';
import { isValidEvmAddress, maskAddress, normalizeEvmAddress } from '../address-utils.js';

const CHECKSUMMED = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed';

describe('isValidEvmAddress', () => {
  it('accepts lower-case and upper-case hex addresses', () => {
    expect(isValidEvmAddress(CHECKSUMMED.toLowerCase())).toBe(true);
    expect(isValidEvmAddress(`0x${CHECKSUMMED.slice(2).toUpperCase()}`)).toBe(true);
  });

  it('accepts a mixed-case address with a valid checksum', () => {
    expect(isValidEvmAddress(CHECKSUMMED)).toBe(true);
  });

  it('rejects a mixed-case address with a broken checksum', () => {
    expect(isValidEvmAddress('0x5AAeb6053F3E94C9b9A09f33669435E7Ef1BeAed')).toBe(false);
  });

  it('rejects wrong lengths and non-hex characters', () => {
    expect(isValidEvmAddress('0x1234')).toBe(false);
    expect(isValidEvmAddress('0xzz00000000000000000000000000000000000000')).toBe(false);
    expect(isValidEvmAddress('5aaeb6053f3e94c9b9a09f33669435e7ef1beaed')).toBe(false);
  });
});

describe('normalizeEvmAddress', () => {
  it('returns the checksum form of a lower-case address', () => {
    const result = normalizeEvmAddress(CHECKSUMMED.toLowerCase());
    expect(result._unsafeUnwrap()).toBe(CHECKSUMMED);
  });

  it('leaves digit-only addresses unchanged', () => {
    const result = normalizeEvmAddress('0x0000000000000000000000000000000000000000');
    expect(result._unsafeUnwrap()).toBe('0x0000000000000000000000000000000000000000');
  });

  it('trims surrounding whitespace', () => {
    const result = normalizeEvmAddress(`  ${CHECKSUMMED}\n`);
    expect(result._unsafeUnwrap()).toBe(CHECKSUMMED);
  });

  it('returns a ConfigError naming the bad input', () => {
    const result = normalizeEvmAddress('0xnotanaddress');
    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe('Invalid address: 0xnotanaddress');
  });
});

describe('maskAddress', () => {
  it('keeps the prefix and the last four characters', () => {
    expect(maskAddress(CHECKSUMMED)).toBe('0x5aAe...eAed');
  });

  it('returns short or missing values as-is', () => {
    expect(maskAddress('0x12')).toBe('0x12');
    expect(maskAddress(undefined)).toBe('');
  });
});
