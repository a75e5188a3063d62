import { createLogger } from '@git-rollout/logger';
import { errorMessage } from '../errors.js';

const logger = createLogger('resource-pool');

/**
 * Resource Pool Configuration
 */
export interface ResourcePoolConfig {
  /** Pool name identifier */
  name: string;

  /** Maximum number of concurrent operations */
  maxConcurrency: number;
}

export type SettledOperation<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown };

/**
 * Resource Pool Exception
 */
export class ResourcePoolRejectedError extends Error {
  constructor(poolName: string, reason: string) {
    super(`Resource pool '${poolName}' rejected operation: ${reason}`);
    this.name = 'ResourcePoolRejectedError';
  }
}

interface QueuedOperation<T> {
  id: string;
  operation: () => Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

/**
 * Bulkhead Resource Isolation
 *
 * Caps how many operations run at once; the rest wait in FIFO order.
 */
export class ResourcePool<T> {
  private readonly config: ResourcePoolConfig;

  private activeOperations = 0;
  private readonly operationQueue: QueuedOperation<T>[] = [];
  private operationCounter = 0;
  private closed = false;

  constructor(config: ResourcePoolConfig) {
    if (!Number.isInteger(config.maxConcurrency) || config.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${config.maxConcurrency}`);
    }
    this.config = config;
  }

  /**
   * Execute operation with resource pool protection
   */
  execute(operation: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new ResourcePoolRejectedError(this.config.name, 'Pool is shutting down'));
    }

    return new Promise<T>((resolve, reject) => {
      this.operationQueue.push({
        id: `${this.config.name}-${++this.operationCounter}`,
        operation,
        resolve,
        reject
      });
      this.drain();
    });
  }

  /**
   * Run every operation through the pool and wait for all of them, keeping
   * each outcome in input order. One rejection never cancels the rest.
   */
  async settleAll(operations: Array<() => Promise<T>>): Promise<SettledOperation<T>[]> {
    return Promise.all(operations.map(async (operation): Promise<SettledOperation<T>> => {
      try {
        return { status: 'fulfilled', value: await this.execute(operation) };
      } catch (reason) {
        return { status: 'rejected', reason };
      }
    }));
  }

  /**
   * Stop accepting work and reject whatever is still queued. Operations that
   * already started are left to finish.
   */
  close(): void {
    this.closed = true;
    for (const queued of this.operationQueue.splice(0)) {
      queued.reject(new ResourcePoolRejectedError(this.config.name, 'Pool is shutting down'));
    }
  }

  private drain(): void {
    while (this.activeOperations < this.config.maxConcurrency && this.operationQueue.length > 0) {
      const next = this.operationQueue.shift();
      if (next) {
        void this.executeOperation(next);
      }
    }
  }

  private async executeOperation(queued: QueuedOperation<T>): Promise<void> {
    this.activeOperations++;

    try {
      queued.resolve(await queued.operation());
    } catch (error) {
      logger.debug({
        poolName: this.config.name,
        operationId: queued.id,
        error: errorMessage(error)
      }, 'Operation failed');
      queued.reject(error);
    } finally {
      this.activeOperations--;
      this.drain();
    }
  }
}
