import { ConfigError } from '@soundness/core';
import { ConsoleSink, initLogger, loggerEnvSchema, type LineWriter, type LogLevel, type Sink } from '@soundness/logger';
import { FileSink } from '@soundness/logger/file';
import { err, ok, type Result } from 'neverthrow';

export interface CliLoggingOptions {
  /** Raise the level to debug so every fetch is logged. */
  verbose: boolean;
  color: boolean;
  stream: LineWriter;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Route log output to stderr, plus a JSON-lines file when LOGGER_FILE_LOG_ENABLED is set.
 */
export function configureCliLogging(options: CliLoggingOptions): Result<void, ConfigError> {
  const parsed = loggerEnvSchema.safeParse(options.env ?? process.env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(new ConfigError(`Invalid logger environment: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim()));
  }
  const env = parsed.data;

  const sinks: Sink[] = [new ConsoleSink({ color: options.color, stream: options.stream })];
  if (env.LOGGER_FILE_LOG_ENABLED) {
    sinks.push(new FileSink({ path: env.LOGGER_FILE_LOG_PATH }));
  }

  const level: LogLevel = options.verbose ? 'debug' : env.LOGGER_LOG_LEVEL;
  initLogger({ level, sinks });
  return ok(undefined);
}
