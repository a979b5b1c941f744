#!/usr/bin/env node
import './env-setup.js';

import { ConsoleSink, flushLoggers, getLogger, initLogger } from '@soundness/logger';
import { Command } from 'commander';

import { registerCompareCommand } from './features/compare/compare.js';

// Until the command reads its flags, only warnings and errors reach stderr
initLogger({ level: 'warn', sinks: [new ConsoleSink()] });

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('zk-account-soundness')
    .description('Compare account balances and nonces between two EVM JSON-RPC endpoints or block heights')
    .version('0.1.0');

  // Compare command - the default, so `zk-account-soundness --rpc-a ... --address ...` works
  registerCompareCommand(program);

  await program.parseAsync();
  flushLoggers();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack ?? ''}`);
  flushLoggers();
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  flushLoggers();
  process.exit(1);
});
