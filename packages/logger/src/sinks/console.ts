import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface LineWriter {
  write(chunk: string): unknown;
}

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
  /** Defaults to stderr so log lines never mix with the report on stdout. */
  stream?: LineWriter;
}

/**
 * Human-readable sink.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 */
export class ConsoleSink extends BufferedSink {
  private readonly colors: ReturnType<typeof pc.createColors>;
  private readonly stream: LineWriter;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.colors = pc.createColors(options?.color ?? false);
    this.stream = options?.stream ?? process.stderr;
  }

  protected writeEntry(entry: LogEntry): void {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const category = `[${entry.category}]`;
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';

    this.stream.write(`${time} ${level} ${category} ${entry.msg}${context}\n`);
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return this.colors.dim(`[${hours}:${minutes}:${seconds}]`);
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    switch (level) {
      case 'debug':
        return this.colors.cyan(upper);
      case 'info':
        return this.colors.green(upper);
      case 'warn':
        return this.colors.yellow(upper);
      case 'error':
        return this.colors.red(upper);
    }
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
