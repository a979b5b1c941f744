import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before the sink writes them out without waiting for the next tick. */
  flushThreshold?: number | undefined;
}

/**
 * Sink that collects entries and writes them on the next tick, so a burst of per-fetch debug
 * lines costs one write pass. Nothing is dropped: a full buffer is written out immediately,
 * and `flush()` empties it before the process exits.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private scheduled: NodeJS.Immediate | undefined;
  private readonly flushThreshold: number;

  constructor(options?: BufferedSinkOptions) {
    this.flushThreshold = options?.flushThreshold ?? 256;
    if (!Number.isInteger(this.flushThreshold) || this.flushThreshold < 1) {
      throw new RangeError(`flushThreshold must be a positive integer, got ${this.flushThreshold}`);
    }
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    this.pending.push(entry);
    if (this.pending.length >= this.flushThreshold) {
      this.flush();
      return;
    }
    this.scheduled ??= setImmediate(() => this.flush());
  }

  flush(): void {
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = undefined;
    }
    const entries = this.pending;
    this.pending = [];
    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
