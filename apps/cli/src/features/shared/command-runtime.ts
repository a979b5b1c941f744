import { flushLoggers, getLogger } from '@soundness/logger';

import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('command-runtime');

export interface CommandRuntimeEffects {
  exit: (code: number) => void;
  onSignal: (handler: () => void) => void;
  offSignal: (handler: () => void) => void;
}

const processEffects: CommandRuntimeEffects = {
  exit: (code) => process.exit(code),
  onSignal: (handler) => process.on('SIGINT', handler),
  offSignal: (handler) => process.off('SIGINT', handler),
};

/**
 * Manages SIGINT handling and cleanup for CLI commands.
 *
 * - `onCleanup()` — LIFO stack, runs during dispose
 * - `onAbort()` — SIGINT: fn() sync → await dispose → exit(130)
 * - `dispose()` — remove SIGINT, run stack. Idempotent. Throws on cleanup failures.
 */
export class CommandContext {
  exitCode: ExitCode = ExitCodes.SUCCESS;

  private _disposed = false;
  private cleanupStack: (() => Promise<void>)[] = [];
  private sigintHandler: (() => void) | undefined;
  private readonly effects: CommandRuntimeEffects;

  constructor(effects?: Partial<CommandRuntimeEffects>) {
    this.effects = { ...processEffects, ...effects };
  }

  /**
   * Flush buffered log sinks, then end the process.
   */
  exit(code: ExitCode): void {
    flushLoggers();
    this.effects.exit(code);
  }

  /**
   * Register a cleanup function. Runs in LIFO order during dispose().
   */
  onCleanup(fn: () => Promise<void>): void {
    this.cleanupStack.push(fn);
  }

  /**
   * Register a SIGINT handler. On Ctrl-C: fn() runs synchronously,
   * then dispose is awaited, then the process exits with 130.
   */
  onAbort(fn: () => void): void {
    // Remove any previous handler
    if (this.sigintHandler) {
      this.effects.offSignal(this.sigintHandler);
    }

    const handler = () => {
      // Remove to prevent double-fire
      this.effects.offSignal(handler);
      this.sigintHandler = undefined;

      // Run sync abort callback (e.g. controller.abort())
      try {
        fn();
      } catch (error) {
        logger.error({ error }, 'Abort callback threw during SIGINT');
      }

      // Await dispose before exiting so cleanup actually completes
      this.dispose()
        .catch((error: unknown) => {
          logger.error({ error }, 'Error during abort dispose');
        })
        .finally(() => {
          this.exit(ExitCodes.CANCELLED);
        });
    };

    this.sigintHandler = handler;
    this.effects.onSignal(handler);
  }

  /**
   * Remove SIGINT handler, run cleanup stack (LIFO).
   * Idempotent — safe to call multiple times.
   */
  async dispose(): Promise<void> {
    if (this._disposed) return;
    this._disposed = true;

    if (this.sigintHandler) {
      this.effects.offSignal(this.sigintHandler);
      this.sigintHandler = undefined;
    }

    // Run cleanup stack in LIFO order (continue on failure, collect errors)
    const errors: Error[] = [];
    let fn = this.cleanupStack.pop();
    while (fn) {
      try {
        await fn();
      } catch (error) {
        logger.error({ error }, 'Cleanup function failed');
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
      fn = this.cleanupStack.pop();
    }

    const [firstError] = errors;
    if (errors.length > 1) {
      throw new AggregateError(errors, 'Multiple cleanup failures');
    }
    if (firstError) {
      throw firstError;
    }
  }
}

/**
 * Run a CLI command with automatic resource cleanup.
 *
 * Does NOT catch fn errors — they propagate to the caller. Dispose always runs.
 * If both fn and dispose fail, the fn error takes priority (dispose error is logged).
 * If only dispose fails, that error propagates. A non-zero `ctx.exitCode` exits the process.
 */
export async function runCommand(
  fn: (ctx: CommandContext) => Promise<void>,
  effects?: Partial<CommandRuntimeEffects>
): Promise<void> {
  const ctx = new CommandContext(effects);
  let fnError: unknown;

  try {
    await fn(ctx);
  } catch (error) {
    fnError = error;
  }

  try {
    await ctx.dispose();
  } catch (disposeError) {
    if (fnError) {
      logger.error({ error: disposeError }, 'Cleanup failed (original error takes priority)');
    } else {
      fnError = disposeError;
    }
  }

  if (fnError) {
    if (fnError instanceof Error) throw fnError;
    throw new Error(typeof fnError === 'string' ? fnError : 'Command failed');
  }

  if (ctx.exitCode !== ExitCodes.SUCCESS) {
    ctx.exit(ctx.exitCode);
  }
}
