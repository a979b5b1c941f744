import { flushLoggers, getLogger, initLogger } from '@soundness/logger';
import { afterEach, describe, expect, it } from 'vitest';

import { configureCliLogging } from '../logging.js';

function createStream() {
  const lines: string[] = [];
  return { lines, stream: { write: (chunk: string) => lines.push(chunk) } };
}

describe('configureCliLogging', () => {
  afterEach(() => {
    initLogger({ sinks: [] });
  });

  it('logs warnings and errors only by default', () => {
    const { lines, stream } = createStream();

    const result = configureCliLogging({ color: false, env: {}, stream, verbose: false });
    getLogger('CompareHandler').info('Source A reachable');
    getLogger('CompareHandler').warn('Sources report different chain ids');
    flushLoggers();

    expect(result.isOk()).toBe(true);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] WARN {2}\[CompareHandler\] Sources report different chain ids\n$/);
  });

  it('lowers the level to debug with --verbose', () => {
    const { lines, stream } = createStream();

    configureCliLogging({ color: false, env: { LOGGER_LOG_LEVEL: 'error' }, stream, verbose: true });
    getLogger('AccountComparator').debug('Fetched 1/2');
    flushLoggers();

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] DEBUG \[AccountComparator\] Fetched 1\/2\n$/);
  });

  it('returns ConfigError for an unknown log level', () => {
    const { stream } = createStream();

    const result = configureCliLogging({ color: false, env: { LOGGER_LOG_LEVEL: 'loud' }, stream, verbose: false });

    expect(result._unsafeUnwrapErr().message).toBe(
      "Invalid logger environment: LOGGER_LOG_LEVEL Invalid enum value. Expected 'debug' | 'info' | 'warn' | 'error', received 'loud'"
    );
  });
});
