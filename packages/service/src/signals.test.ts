import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { installShutdownHandlers } from './signals';

describe('installShutdownHandlers', () => {
  const logger = { info: vi.fn(), warn: vi.fn() };
  const exit = vi.fn();
  // Emitted by hand; never delivered by the OS during tests
  const signals: NodeJS.Signals[] = ['SIGUSR2'];
  let uninstall: () => void = () => {};

  beforeEach(() => {
    logger.info.mockReset();
    logger.warn.mockReset();
    exit.mockReset();
  });

  afterEach(() => {
    uninstall();
  });

  it('should run the shutdown hook and exit 0', async () => {
    const onShutdown = vi.fn().mockResolvedValue(undefined);
    uninstall = installShutdownHandlers({ onShutdown, logger, exit, signals });

    process.emit('SIGUSR2', 'SIGUSR2');

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    expect(onShutdown).toHaveBeenCalledOnce();
    expect(logger.info).toHaveBeenCalledWith('Received shutdown signal', { signal: 'SIGUSR2' });
  });

  it('should exit 1 when the shutdown hook fails', async () => {
    uninstall = installShutdownHandlers({
      onShutdown: vi.fn().mockRejectedValue(new Error('mongo gone')),
      logger,
      exit,
      signals,
    });

    process.emit('SIGUSR2', 'SIGUSR2');

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(1));
    expect(logger.warn).toHaveBeenCalledWith('Error during shutdown', { error: 'mongo gone' });
  });

  it('should force exit on a second signal', async () => {
    uninstall = installShutdownHandlers({
      onShutdown: () => new Promise(() => {}),
      logger,
      exit,
      signals,
      graceMs: 20,
    });

    process.emit('SIGUSR2', 'SIGUSR2');
    process.emit('SIGUSR2', 'SIGUSR2');

    expect(exit).toHaveBeenCalledWith(1);
    expect(logger.warn).toHaveBeenCalledWith('Forced exit on second signal', { signal: 'SIGUSR2' });
    // The first shutdown still times out on its own
    await vi.waitFor(() => expect(exit).toHaveBeenCalledTimes(2));
  });

  it('should listen for SIGTERM and SIGINT by default and remove the handlers', () => {
    const before = [process.listenerCount('SIGTERM'), process.listenerCount('SIGINT')];
    uninstall = installShutdownHandlers({ onShutdown: vi.fn(), logger, exit });

    expect([process.listenerCount('SIGTERM'), process.listenerCount('SIGINT')]).toEqual([before[0] + 1, before[1] + 1]);

    uninstall();
    uninstall = () => {};
    expect([process.listenerCount('SIGTERM'), process.listenerCount('SIGINT')]).toEqual(before);
  });

  it('should exit 1 when shutdown overruns the grace period', async () => {
    uninstall = installShutdownHandlers({
      onShutdown: () => new Promise(() => {}),
      logger,
      exit,
      signals,
      graceMs: 10,
    });

    process.emit('SIGUSR2', 'SIGUSR2');

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(1));
    expect(logger.warn).toHaveBeenCalledWith('Error during shutdown', { error: 'Shutdown timed out after 10ms' });
  });
});
