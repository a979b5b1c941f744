export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
  /** Source of entry timestamps. */
  clock?: (() => Date) | undefined;
}

const MAX_CONTEXT_DEPTH = 3;

/**
 * Turn a context value into something JSON.stringify accepts: balances are bigints and
 * failures arrive as Error instances. Nesting past a few levels is cut off, which also
 * stops reference cycles.
 */
function toLogValue(value: unknown, depth: number): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Error) {
    const cause = value.cause === undefined ? {} : { cause: toLogValue(value.cause, depth + 1) };
    return { message: value.message, name: value.name, ...cause };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (depth >= MAX_CONTEXT_DEPTH) {
    return '[Truncated]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => toLogValue(item, depth + 1));
  }
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toLogValue(item, depth + 1)]));
}

function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).map(([key, value]) => [key, toLogValue(value, 0)]));
}

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    // Read at call time: loggers are created at import, before the CLI configures logging
    if (levelOrder[level] < levelOrder[state.level]) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { category: this.category, level, msg: msgOrObj, timestamp: state.clock() }
        : {
            category: this.category,
            context: serializeContext(msgOrObj),
            level,
            msg: maybeMsg ?? '',
            timestamp: state.clock(),
          };

    for (const sink of state.sinks) {
      sink.write(entry);
    }
  }
}

interface LoggerState {
  level: LogLevel;
  sinks: Sink[];
  clock: () => Date;
}

// Silent until initLogger installs sinks
let state: LoggerState = {
  clock: () => new Date(),
  level: 'info',
  sinks: [],
};

const loggerCache = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  state = {
    clock: config.clock ?? (() => new Date()),
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  let logger = loggerCache.get(category);
  if (!logger) {
    logger = new CategoryLogger(category);
    loggerCache.set(category, logger);
  }
  return logger;
}

export function flushLoggers(): void {
  for (const sink of state.sinks) {
    sink.flush();
  }
}
