import { EvmRpcChainReader, type ChainReader } from '@soundness/chain-reader';
import { renderReport } from '@soundness/comparison';
import { BLOCK_TAGS, CancelledError, ConfigError, type SourceRef } from '@soundness/core';
import type { Command } from 'commander';
import pc from 'picocolors';

import { displayCliError } from '../shared/cli-error.js';
import { runCommand, type CommandContext, type CommandRuntimeEffects } from '../shared/command-runtime.js';
import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import { configureCliLogging } from '../shared/logging.js';
import { processOutput, type CliOutput, type OutputFormat } from '../shared/output.js';
import { CompareCommandOptionsSchema, validateCliEnv } from '../shared/schemas.js';

import { buildCompareConfig } from './compare-config.js';
import { CompareHandler } from './compare-handler.js';
import type { CompareConfig } from './compare-types.js';

export type ReaderFactory = (source: SourceRef, config: CompareConfig) => ChainReader;

/**
 * Seams for tests; every field defaults to the real process.
 */
export interface CompareCommandDeps {
  env?: NodeJS.ProcessEnv | undefined;
  output?: CliOutput | undefined;
  colorSupported?: boolean | undefined;
  createReader?: ReaderFactory | undefined;
  clock?: (() => Date) | undefined;
  runtime?: Partial<CommandRuntimeEffects> | undefined;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

/**
 * Register the compare command. It is the default command, so flags may follow the program name directly.
 */
export function registerCompareCommand(program: Command): void {
  program
    .command('compare', { isDefault: true })
    .description('Compare balance and nonce of accounts between two JSON-RPC endpoints or block heights')
    .option('--rpc-a <url>', 'JSON-RPC endpoint of source A (default: $RPC_URL)')
    .option('--rpc-b <url>', 'JSON-RPC endpoint of source B (default: $RPC_URL_B)')
    .option('--address <address>', 'Account to compare (repeat for several accounts)', collect, [])
    .option('--block-a <block>', `Block of source A: ${BLOCK_TAGS.join(', ')} or a height`, 'latest')
    .option('--block-b <block>', `Block of source B: ${BLOCK_TAGS.join(', ')} or a height`, 'latest')
    .option('--timeout <seconds>', 'Per-request timeout in seconds', '30')
    .option('--concurrency <n>', 'Maximum fetches in flight across both sources', '8')
    .option('--retries <n>', 'Attempts per request', '1')
    .option('--batch', 'Send the balance and nonce calls of one account as a single JSON-RPC batch')
    .option('--no-preflight', 'Skip the connectivity check before comparing')
    .option('--no-color', 'Disable colours in text output')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log every fetch to stderr')
    .addHelpText(
      'after',
      `
Examples:
  $ zk-account-soundness --rpc-a https://a.example --rpc-b https://b.example --address 0x0000000000000000000000000000000000000001
  $ zk-account-soundness --rpc-a https://a.example --rpc-b https://a.example --block-a 100 --block-b 200 --address 0x... --json

Exit codes:
  0  every account matches
  1  invalid arguments, or an endpoint failed the preflight check
  2  at least one account differs or could not be read
  130  interrupted
`
    )
    .action(async (rawOptions: unknown) => {
      await executeCompareCommand(rawOptions);
    });
}

/**
 * Execute the compare command.
 */
export async function executeCompareCommand(rawOptions: unknown, deps: CompareCommandDeps = {}): Promise<void> {
  const output = deps.output ?? processOutput();

  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  await runCommand(async (ctx) => {
    const fail = (error: Error, exitCode: ExitCode, format: OutputFormat, color = false) => {
      displayCliError('compare', error, exitCode, { color, format, output });
      ctx.exitCode = exitCode;
    };

    // Validate options at CLI boundary with Zod
    const validationResult = CompareCommandOptionsSchema.safeParse(rawOptions);
    if (!validationResult.success) {
      const firstError = validationResult.error.issues[0];
      fail(new ConfigError(firstError?.message ?? 'Invalid options'), ExitCodes.GENERAL_ERROR, isJsonMode ? 'json' : 'text');
      return;
    }

    const configResult = buildCompareConfig(validationResult.data, {
      colorSupported: deps.colorSupported ?? pc.isColorSupported,
      env: validateCliEnv(deps.env),
    });
    if (configResult.isErr()) {
      fail(configResult.error, ExitCodes.GENERAL_ERROR, isJsonMode ? 'json' : 'text');
      return;
    }
    const config = configResult.value;

    const logging = configureCliLogging({
      color: config.color,
      env: deps.env,
      stream: output.stderr,
      verbose: config.verbose,
    });
    if (logging.isErr()) {
      fail(logging.error, ExitCodes.GENERAL_ERROR, config.format, config.color);
      return;
    }

    await runComparison(ctx, config, output, deps, fail);
  }, deps.runtime);
}

async function runComparison(
  ctx: CommandContext,
  config: CompareConfig,
  output: CliOutput,
  deps: CompareCommandDeps,
  fail: (error: Error, exitCode: ExitCode, format: OutputFormat, color?: boolean) => void
): Promise<void> {
  const createReader = deps.createReader ?? createEvmRpcReader;
  const readerA = createReader(config.sourceA, config);
  const readerB = createReader(config.sourceB, config);
  ctx.onCleanup(async () => {
    await Promise.all([readerA.close(), readerB.close()]);
  });

  const controller = new AbortController();
  ctx.onAbort(() => controller.abort());

  const handler = new CompareHandler(readerA, readerB, { clock: deps.clock });
  const result = await handler.execute(config, controller.signal);

  if (result.isErr()) {
    const exitCode = result.error instanceof CancelledError ? ExitCodes.CANCELLED : ExitCodes.GENERAL_ERROR;
    fail(result.error, exitCode, config.format, config.color);
    return;
  }

  output.stdout.write(`${renderReport(result.value.summary, config.format, { color: config.color })}\n`);
  ctx.exitCode = result.value.exitCode;
}

function createEvmRpcReader(source: SourceRef, config: CompareConfig): ChainReader {
  return new EvmRpcChainReader({
    batch: config.batch,
    endpoint: source.endpoint,
    name: source.label,
    retries: config.retries,
    timeoutMs: config.timeoutMs,
  });
}
