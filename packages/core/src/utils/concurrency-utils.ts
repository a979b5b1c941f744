import { err, ok, type Result } from 'neverthrow';

import { CancelledError } from '../errors/index.js';

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Results are stored by input index, so their order never depends on completion order.
 * Once `signal` aborts no further item is started; calls already running are awaited
 * and the whole run resolves to a CancelledError.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Result<R[], CancelledError>> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  // One shared iterator: each next() hands a distinct entry to whichever worker asks first
  const entries = items.entries();

  const runLane = async (): Promise<void> => {
    for (const [index, item] of entries) {
      if (signal?.aborted) return;
      results[index] = await worker(item, index);
    }
  };

  const laneCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => runLane()));

  if (signal?.aborted) {
    return err(new CancelledError('Operation cancelled'));
  }

  return ok(results);
}
