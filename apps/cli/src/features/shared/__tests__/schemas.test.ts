import { describe, expect, it } from 'vitest';

import { CompareCommandOptionsSchema, EndpointUrlSchema, validateCliEnv } from '../schemas.js';

describe('CompareCommandOptionsSchema', () => {
  it('applies defaults to commander output', () => {
    const result = CompareCommandOptionsSchema.safeParse({
      address: ['0x1111111111111111111111111111111111111111'],
      color: true,
      preflight: true,
    });

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      address: ['0x1111111111111111111111111111111111111111'],
      batch: false,
      blockA: 'latest',
      blockB: 'latest',
      color: true,
      concurrency: 8,
      preflight: true,
      retries: 1,
      timeout: 30,
    });
  });

  it('coerces numeric flags given as strings', () => {
    const result = CompareCommandOptionsSchema.safeParse({
      address: ['0x1'],
      concurrency: '3',
      retries: '2',
      timeout: '1.5',
    });

    expect(result.data?.concurrency).toBe(3);
    expect(result.data?.retries).toBe(2);
    expect(result.data?.timeout).toBe(1.5);
  });

  it('accepts the longest timeout a timer can hold', () => {
    const result = CompareCommandOptionsSchema.safeParse({ address: ['0x1'], timeout: '2147483' });

    expect(result.data?.timeout).toBe(2_147_483);
  });

  it('requires at least one address', () => {
    const result = CompareCommandOptionsSchema.safeParse({ address: [] });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('At least one --address is required');
  });

  it('requires an address when the flag is missing entirely', () => {
    const result = CompareCommandOptionsSchema.safeParse({});

    expect(result.error?.issues[0]?.message).toBe('At least one --address is required');
  });

  it.each([
    [{ timeout: '0' }, '--timeout must be greater than zero'],
    [{ timeout: 'soon' }, '--timeout must be a number'],
    [{ timeout: '3000000' }, '--timeout must be at most 2147483 seconds'],
    [{ concurrency: '0' }, '--concurrency must be greater than zero'],
    [{ concurrency: '2.5' }, '--concurrency must be a whole number'],
    [{ retries: '-1' }, '--retries must be greater than zero'],
  ])('rejects %o', (flags, message) => {
    const result = CompareCommandOptionsSchema.safeParse({ address: ['0x1'], ...flags });

    expect(result.error?.issues[0]?.message).toBe(message);
  });
});

describe('EndpointUrlSchema', () => {
  it('accepts http and https URLs', () => {
    expect(EndpointUrlSchema.safeParse('http://localhost:8545').success).toBe(true);
    expect(EndpointUrlSchema.safeParse('https://rpc.example.com/v1/test-key').success).toBe(true);
  });

  it('rejects other schemes and bare hosts', () => {
    expect(EndpointUrlSchema.safeParse('ws://localhost:8546').success).toBe(false);
    expect(EndpointUrlSchema.safeParse('localhost:8545').success).toBe(false);
  });
});

describe('validateCliEnv', () => {
  it('reads both endpoints', () => {
    expect(validateCliEnv({ RPC_URL: 'http://a.test', RPC_URL_B: 'http://b.test' })).toEqual({
      RPC_URL: 'http://a.test',
      RPC_URL_B: 'http://b.test',
    });
  });

  it('treats empty values as unset', () => {
    expect(validateCliEnv({ RPC_URL: '  ', RPC_URL_B: '' })).toEqual({ RPC_URL: undefined, RPC_URL_B: undefined });
  });
});
