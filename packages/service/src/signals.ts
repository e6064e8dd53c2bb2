import { errorMessage, withTimeout } from '@alert-buckets/core';

export interface ShutdownContext {
  onShutdown: () => Promise<void>;
  logger: {
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
  };
  /** Force exit if onShutdown takes longer (ms). Default: 10000 */
  graceMs?: number;
  exit?: (code: number) => void;
  /** Default: SIGTERM and SIGINT */
  signals?: NodeJS.Signals[];
}

/**
 * Run `onShutdown` on the first SIGTERM/SIGINT, then exit. A second signal,
 * or a shutdown that overruns the grace period, exits with code 1.
 *
 * @returns a function that removes the handlers
 */
export function installShutdownHandlers(ctx: ShutdownContext): () => void {
  const graceMs = ctx.graceMs ?? 10_000;
  const signals = ctx.signals ?? ['SIGTERM', 'SIGINT'];
  const exit = ctx.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      ctx.logger.warn('Forced exit on second signal', { signal });
      exit(1);
      return;
    }

    shuttingDown = true;
    ctx.logger.info('Received shutdown signal', { signal });

    try {
      await withTimeout(ctx.onShutdown(), graceMs, () => new Error(`Shutdown timed out after ${graceMs}ms`));
      exit(0);
    } catch (err) {
      ctx.logger.warn('Error during shutdown', { error: errorMessage(err) });
      exit(1);
    }
  };

  const handler = (signal: NodeJS.Signals) => {
    void shutdown(signal);
  };

  for (const signal of signals) process.on(signal, handler);
  return () => {
    for (const signal of signals) process.off(signal, handler);
  };
}
