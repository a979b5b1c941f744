import { EvmRpcChainReader } from '@soundness/chain-reader';
import { createTracker, FakeChainReader, type FakeAccount } from '@soundness/chain-reader/testing';
import { CancelledError, ConfigError, createSourceRef, FetchError } from '@soundness/core';
import { describe, expect, it, vi } from 'vitest';

import { ADDRESS_1, ADDRESS_2, ADDRESS_3 } from '../../__tests__/fixtures.js';
import { AccountComparator } from '../account-comparator.js';

const sourceA = createSourceRef('A', 'http://a.example', 'latest');
const sourceB = createSourceRef('B', 'http://b.example', 'latest');

function createComparator(
  accountsA: Record<string, FakeAccount>,
  accountsB: Record<string, FakeAccount>,
  maxConcurrency = 8
) {
  const readerA = new FakeChainReader(accountsA);
  const readerB = new FakeChainReader(accountsB);
  return { comparator: new AccountComparator(readerA, readerB, { maxConcurrency }), readerA, readerB };
}

describe('AccountComparator', () => {
  it('matches an empty account on both sides', async () => {
    const { comparator } = createComparator({}, {});

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1]))._unsafeUnwrap();

    expect(summary.results.map((result) => result.outcome)).toEqual(['MATCH']);
    expect(summary.overallStatus).toBe('OK');
  });

  it('matches large balances exactly', async () => {
    const account = { balance: 10n ** 24n, nonce: 7 };
    const { comparator } = createComparator({ [ADDRESS_1]: account }, { [ADDRESS_1]: account });

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1]))._unsafeUnwrap();

    expect(summary.results[0]?.outcome).toBe('MATCH');
    expect(summary.overallStatus).toBe('OK');
  });

  it('flags a balance mismatch', async () => {
    const { comparator } = createComparator(
      { [ADDRESS_1]: { balance: 100n, nonce: 1 } },
      { [ADDRESS_1]: { balance: 99n, nonce: 1 } }
    );

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1]))._unsafeUnwrap();

    expect(summary.results[0]?.outcome).toBe('MISMATCH_BALANCE');
    expect(summary.overallStatus).toBe('MISMATCH');
  });

  it('keeps other accounts when one side times out', async () => {
    const timeout = new FetchError('TIMEOUT', 'Request timeout after 30000ms');
    const { comparator } = createComparator(
      { [ADDRESS_1]: { balance: 5n, nonce: 1 }, [ADDRESS_2]: { balance: 6n, nonce: 2 } },
      { [ADDRESS_1]: { balance: 5n, nonce: 1 }, [ADDRESS_2]: timeout }
    );

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_2, ADDRESS_3]))._unsafeUnwrap();

    expect(summary.results.map((result) => result.outcome)).toEqual(['MATCH', 'FETCH_ERROR', 'MATCH']);
    const failed = summary.results[1];
    expect(failed?.stateA.ok).toBe(true);
    const stateB = failed?.stateB;
    expect(stateB && !stateB.ok ? stateB.error.kind : undefined).toBe('TIMEOUT');
    expect(summary.overallStatus).toBe('MISMATCH');
    expect(summary.counts).toEqual({ fetchError: 1, match: 2, mismatch: 0, total: 3 });
  });

  it('reports a nonce mismatch next to a match', async () => {
    const { comparator } = createComparator(
      { [ADDRESS_1]: { balance: 1n, nonce: 1 }, [ADDRESS_2]: { balance: 2n, nonce: 3 } },
      { [ADDRESS_1]: { balance: 1n, nonce: 1 }, [ADDRESS_2]: { balance: 2n, nonce: 4 } }
    );

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_2]))._unsafeUnwrap();

    expect(summary.results.map((result) => result.outcome)).toEqual(['MATCH', 'MISMATCH_NONCE']);
  });

  it('reads each source at its own block', async () => {
    const { comparator, readerA, readerB } = createComparator({}, {});

    await comparator.compare(
      createSourceRef('A', 'http://a.example', 100),
      createSourceRef('B', 'http://a.example', 'finalized'),
      [ADDRESS_1]
    );

    expect(readerA.requested).toEqual([{ address: ADDRESS_1, blockRef: 100 }]);
    expect(readerB.requested).toEqual([{ address: ADDRESS_1, blockRef: 'finalized' }]);
  });

  it('preserves input order when later accounts finish first', async () => {
    const delays = { [ADDRESS_1]: 30, [ADDRESS_2]: 10, [ADDRESS_3]: 1 };
    const readerA = new FakeChainReader({ [ADDRESS_1]: { balance: 1n, nonce: 0 } }, { delays });
    const readerB = new FakeChainReader({}, { delays });
    const comparator = new AccountComparator(readerA, readerB);

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_2, ADDRESS_3]))._unsafeUnwrap();

    expect(summary.results.map((result) => result.address)).toEqual([ADDRESS_1, ADDRESS_2, ADDRESS_3]);
    expect(summary.results.map((result) => result.outcome)).toEqual(['MISMATCH_BALANCE', 'MATCH', 'MATCH']);
  });

  it('keeps duplicate addresses as separate results', async () => {
    const { comparator } = createComparator({}, {});

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_1]))._unsafeUnwrap();

    expect(summary.results).toHaveLength(2);
    expect(summary.counts.total).toBe(2);
  });

  it('never exceeds the concurrency bound across both sources', async () => {
    const tracker = createTracker();
    const readerA = new FakeChainReader({}, { tracker });
    const readerB = new FakeChainReader({}, { tracker });
    const comparator = new AccountComparator(readerA, readerB, { maxConcurrency: 3 });

    const result = await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_2, ADDRESS_3, ADDRESS_1]);

    expect(result.isOk()).toBe(true);
    expect(tracker.peak).toBe(3);
  });

  it('bounds open HTTP requests, not just reads, across both JSON-RPC sources', async () => {
    let inFlight = 0;
    let peak = 0;
    const fetch = vi.fn().mockImplementation(async (_url: string, init: { body: string | null }) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      inFlight--;
      const request: unknown = JSON.parse(init.body ?? 'null');
      const id = typeof request === 'object' && request !== null && 'id' in request ? request.id : null;
      return {
        headers: new Headers(),
        json: () => Promise.resolve({ id, jsonrpc: '2.0', result: '0x0' }),
        ok: true,
        status: 200,
        text: () => Promise.resolve(''),
      };
    });
    const effects = { delay: () => Promise.resolve(), fetch, log: vi.fn(), now: () => 0 };
    const readerA = new EvmRpcChainReader({ endpoint: 'http://a.example', name: 'A' }, effects);
    const readerB = new EvmRpcChainReader({ endpoint: 'http://b.example', name: 'B' }, effects);
    const comparator = new AccountComparator(readerA, readerB, { maxConcurrency: 1 });

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_2]))._unsafeUnwrap();
    await Promise.all([readerA.close(), readerB.close()]);

    expect(summary.counts).toEqual({ fetchError: 0, match: 2, mismatch: 0, total: 2 });
    expect(fetch).toHaveBeenCalledTimes(8);
    expect(peak).toBe(1);
  });

  it('captures the timestamp before fetching and measures elapsed time', async () => {
    const clock = vi
      .fn()
      .mockReturnValueOnce(new Date('2024-05-01T10:00:00.000Z'))
      .mockReturnValueOnce(new Date('2024-05-01T10:00:01.500Z'));
    const comparator = new AccountComparator(new FakeChainReader({}), new FakeChainReader({}), { clock });

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1]))._unsafeUnwrap();

    expect(summary.timestamp).toBe('2024-05-01T10:00:00.000Z');
    expect(summary.elapsedMs).toBe(1500);
    expect(clock).toHaveBeenCalledTimes(2);
  });

  it('returns ConfigError for an empty address list', async () => {
    const { comparator, readerA } = createComparator({}, {});

    const error = (await comparator.compare(sourceA, sourceB, []))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe('At least one address is required');
    expect(readerA.requested).toHaveLength(0);
  });

  it('returns CancelledError and starts no new fetches once aborted', async () => {
    const controller = new AbortController();
    const readerA = new FakeChainReader({}, { onFetch: () => controller.abort() });
    const readerB = new FakeChainReader({});
    const comparator = new AccountComparator(readerA, readerB, { maxConcurrency: 1 });

    const result = await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_2, ADDRESS_3], {
      signal: controller.signal,
    });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(CancelledError);
    expect(readerA.requested).toHaveLength(1);
    expect(readerB.requested).toHaveLength(0);
  });

  it('confines an unexpected reader exception to its account', async () => {
    const readerA = new FakeChainReader({});
    const readerB = new FakeChainReader(
      {},
      {
        onFetch: (address) => {
          if (address === ADDRESS_2) throw new Error('socket hang up');
        },
      }
    );
    const comparator = new AccountComparator(readerA, readerB);

    const summary = (await comparator.compare(sourceA, sourceB, [ADDRESS_1, ADDRESS_2]))._unsafeUnwrap();

    expect(summary.results.map((result) => result.outcome)).toEqual(['MATCH', 'FETCH_ERROR']);
    const stateB = summary.results[1]?.stateB;
    expect(stateB && !stateB.ok ? stateB.error.message : undefined).toBe('socket hang up');
  });

  it('rejects a non-positive concurrency bound', () => {
    expect(() => createComparator({}, {}, 0)).toThrow('maxConcurrency must be a positive integer, got 0');
  });
});
