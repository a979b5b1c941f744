export {
  initLogger,
  getLogger,
  flushLoggers,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions, type LineWriter } from './sinks/console.js';
export { loggerEnvSchema, type LoggerEnvConfig } from './env.schema.js';
