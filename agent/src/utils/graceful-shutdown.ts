/**
 * Graceful Shutdown Handler
 *
 * SIGTERM and SIGINT run the registered cleanup functions in registration
 * order and exit 0. A shutdown that hangs is cut short with exit code 1.
 */

import { createLogger } from '@git-rollout/logger';

const logger = createLogger('graceful-shutdown');

interface ShutdownState {
  isShuttingDown: boolean;
  forceShutdownTimeout: NodeJS.Timeout | null;
}

const shutdownState: ShutdownState = {
  isShuttingDown: false,
  forceShutdownTimeout: null
};

/**
 * Time allowed for cleanup before the process is terminated
 */
const GRACEFUL_SHUTDOWN_TIMEOUT = 30000;

const cleanupFunctions: Array<() => Promise<void>> = [];

/**
 * Add cleanup function to shutdown sequence
 */
export function addCleanupFunction(fn: () => Promise<void>): void {
  cleanupFunctions.push(fn);
}

/**
 * Execute graceful shutdown sequence
 */
export async function executeGracefulShutdown(signal: string): Promise<void> {
  if (shutdownState.isShuttingDown) {
    logger.warn({ signal }, 'Shutdown already in progress');
    return;
  }

  shutdownState.isShuttingDown = true;

  logger.info({
    signal,
    timeout: GRACEFUL_SHUTDOWN_TIMEOUT,
    cleanupFunctions: cleanupFunctions.length
  }, 'Starting graceful shutdown');

  const forceShutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timeout reached, forcing exit');
    process.exit(1);
  }, GRACEFUL_SHUTDOWN_TIMEOUT);
  forceShutdownTimeout.unref();
  shutdownState.forceShutdownTimeout = forceShutdownTimeout;

  // Sequential: the poll loop stops before the health server goes away
  for (const [index, fn] of cleanupFunctions.entries()) {
    try {
      await fn();
      logger.debug({ functionIndex: index }, 'Cleanup function completed');
    } catch (error) {
      logger.error({
        error: error instanceof Error ? error.message : String(error),
        functionIndex: index
      }, 'Cleanup function failed');
    }
  }

  clearTimeout(forceShutdownTimeout);
  shutdownState.forceShutdownTimeout = null;

  logger.info({ signal }, 'Graceful shutdown completed');
  process.exit(0);
}

function handleShutdownSignal(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Received shutdown signal');

  executeGracefulShutdown(signal).catch((error: unknown) => {
    logger.error({
      error: error instanceof Error ? error.message : String(error),
      signal
    }, 'Failed to execute graceful shutdown');
    process.exit(1);
  });
}

function handleUncaughtException(error: Error): void {
  logger.fatal({
    error: error.message,
    stack: error.stack
  }, 'Uncaught exception, forcing shutdown');
  process.exit(1);
}

function handleUnhandledRejection(reason: unknown): void {
  logger.fatal({
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined
  }, 'Unhandled promise rejection, forcing shutdown');
  process.exit(1);
}

type HandlerRegistration =
  | { event: NodeJS.Signals; handler: NodeJS.SignalsListener }
  | { event: 'uncaughtException'; handler: NodeJS.UncaughtExceptionListener }
  | { event: 'unhandledRejection'; handler: NodeJS.UnhandledRejectionListener };

const registeredHandlers: HandlerRegistration[] = [];
let handlersInstalled = false;

function attach(registration: HandlerRegistration): void {
  switch (registration.event) {
    case 'uncaughtException':
      process.addListener(registration.event, registration.handler);
      break;
    case 'unhandledRejection':
      process.addListener(registration.event, registration.handler);
      break;
    default:
      process.addListener(registration.event, registration.handler);
  }
  registeredHandlers.push(registration);
}

function detach(registration: HandlerRegistration): void {
  process.removeListener(registration.event, registration.handler);
}

/**
 * Initialize graceful shutdown handlers
 */
export function initializeGracefulShutdown(): void {
  if (handlersInstalled) {
    return;
  }

  attach({ event: 'SIGTERM', handler: handleShutdownSignal });
  attach({ event: 'SIGINT', handler: handleShutdownSignal });
  attach({ event: 'uncaughtException', handler: handleUncaughtException });
  attach({ event: 'unhandledRejection', handler: handleUnhandledRejection });

  handlersInstalled = true;

  logger.info({ gracefulTimeout: GRACEFUL_SHUTDOWN_TIMEOUT }, 'Graceful shutdown handlers initialized');
}

/**
 * Test-only helper to remove handlers between specs
 */
export function __resetGracefulShutdownHandlersForTests(): void {
  for (const registration of registeredHandlers) {
    detach(registration);
  }
  registeredHandlers.length = 0;
  cleanupFunctions.length = 0;
  handlersInstalled = false;
  shutdownState.isShuttingDown = false;
  if (shutdownState.forceShutdownTimeout) {
    clearTimeout(shutdownState.forceShutdownTimeout);
    shutdownState.forceShutdownTimeout = null;
  }
}

export function isShuttingDown(): boolean {
  return shutdownState.isShuttingDown;
}
