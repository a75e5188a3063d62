import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@git-rollout/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn()
  })
}));

import {
  __resetGracefulShutdownHandlersForTests,
  addCleanupFunction,
  executeGracefulShutdown,
  initializeGracefulShutdown,
  isShuttingDown
} from '../src/utils/graceful-shutdown.js';

describe('graceful-shutdown', () => {
  let processExit: any;
  let processAddListener: any;

  beforeEach(() => {
    __resetGracefulShutdownHandlersForTests();
    processExit = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as any);
    processAddListener = vi.spyOn(process, 'addListener');
  });

  afterEach(() => {
    __resetGracefulShutdownHandlersForTests();
    vi.restoreAllMocks();
  });

  describe('initializeGracefulShutdown', () => {
    it('registers signal and crash handlers', () => {
      initializeGracefulShutdown();

      const events = processAddListener.mock.calls.map(([event]: [string]) => event);
      expect(events).toEqual(['SIGTERM', 'SIGINT', 'uncaughtException', 'unhandledRejection']);
    });

    it('registers the handlers only once', () => {
      initializeGracefulShutdown();
      initializeGracefulShutdown();

      expect(processAddListener).toHaveBeenCalledTimes(4);
    });

    it('removes its handlers on reset', () => {
      const before = process.listenerCount('SIGTERM');
      initializeGracefulShutdown();
      expect(process.listenerCount('SIGTERM')).toBe(before + 1);

      __resetGracefulShutdownHandlersForTests();
      expect(process.listenerCount('SIGTERM')).toBe(before);
    });
  });

  describe('cleanup functions', () => {
    it('runs them in registration order and exits 0', async () => {
      const order: string[] = [];
      addCleanupFunction(async () => {
        await new Promise((resolve) => setImmediate(resolve));
        order.push('poll-loop');
      });
      addCleanupFunction(async () => {
        order.push('http-server');
      });

      await executeGracefulShutdown('SIGTERM');

      expect(order).toEqual(['poll-loop', 'http-server']);
      expect(processExit).toHaveBeenCalledWith(0);
    });

    it('keeps going when a cleanup function fails', async () => {
      const after = vi.fn(async () => undefined);
      addCleanupFunction(async () => {
        throw new Error('server already closed');
      });
      addCleanupFunction(after);

      await executeGracefulShutdown('SIGINT');

      expect(after).toHaveBeenCalledTimes(1);
      expect(processExit).toHaveBeenCalledWith(0);
    });
  });

  describe('shutdown state', () => {
    it('reports shutting down once a signal is handled', async () => {
      expect(isShuttingDown()).toBe(false);

      await executeGracefulShutdown('SIGTERM');

      expect(isShuttingDown()).toBe(true);
    });

    it('ignores a second signal while shutting down', async () => {
      const cleanup = vi.fn(async () => undefined);
      addCleanupFunction(cleanup);

      await Promise.all([executeGracefulShutdown('SIGTERM'), executeGracefulShutdown('SIGINT')]);

      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(processExit).toHaveBeenCalledTimes(1);
    });
  });
});
