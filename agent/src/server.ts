/**
 * Health and metrics endpoints for the kubelet probes and Prometheus
 */

import http from 'node:http';
import type { Registry } from 'prom-client';
import {
  HealthChecker,
  createLogger,
  memoryCheck,
  type HealthCheckResult
} from '@git-rollout/logger';
import type { PollLoopStatus } from './controller/poll-loop.js';
import { isShuttingDown } from './utils/graceful-shutdown.js';

const logger = createLogger('http-server');

export interface StatusSource {
  getStatus(): PollLoopStatus;
}

export interface HttpResponse {
  statusCode: number;
  contentType: string;
  body: string;
}

export interface AgentServerOptions {
  loop: StatusSource;
  registry: Registry;
  version?: string;
  /** Heap budget for the memory check */
  maxMemoryMB?: number;
}

/**
 * Unhealthy until the first successful sync, degraded while syncs fail
 */
export function pollLoopHealth(status: PollLoopStatus): HealthCheckResult {
  const details = {
    state: status.state,
    revision: status.revision,
    consecutiveSyncFailures: status.consecutiveSyncFailures,
    pendingRetries: status.pendingRetries,
    lastSuccessAt: status.lastSuccessAt?.toISOString()
  };

  if (!status.ready) {
    return { status: 'unhealthy', message: 'No successful sync yet', details };
  }
  if (status.lastSyncFailed) {
    return {
      status: 'degraded',
      message: `Last sync failed (${status.consecutiveSyncFailures} in a row)`,
      details
    };
  }
  return { status: 'healthy', message: `Synced at ${status.revision}`, details };
}

export class AgentServer {
  private readonly options: AgentServerOptions;
  private readonly health: HealthChecker;
  private readonly server: http.Server;

  constructor(options: AgentServerOptions) {
    this.options = options;
    this.health = new HealthChecker('git-rollout-agent', { version: options.version });
    this.health.register('poll-loop', async () => pollLoopHealth(options.loop.getStatus()));
    this.health.register('memory', memoryCheck({ budgetMB: options.maxMemoryMB ?? 512 }), { critical: false });

    this.server = http.createServer((req, res) => {
      this.handle(req.url)
        .then((response) => {
          res.writeHead(response.statusCode, { 'content-type': response.contentType });
          res.end(response.body);
        })
        .catch((error: unknown) => {
          logger.error({ error: error instanceof Error ? error.message : String(error), url: req.url }, 'HTTP server error');
          res.writeHead(500);
          res.end('Internal Server Error');
        });
    });
  }

  async handle(url: string | undefined): Promise<HttpResponse> {
    const pathname = new URL(url ?? '/', 'http://localhost').pathname;

    switch (pathname) {
      case '/health': {
        const health = await this.health.check();
        return {
          statusCode: health.status === 'unhealthy' ? 503 : 200,
          contentType: 'application/json',
          body: JSON.stringify(health, null, 2)
        };
      }
      case '/ready': {
        const status = this.options.loop.getStatus();
        const ready = status.ready && !isShuttingDown();
        return {
          statusCode: ready ? 200 : 503,
          contentType: 'application/json',
          body: JSON.stringify({ ready, revision: status.revision, timestamp: new Date().toISOString() })
        };
      }
      case '/metrics':
        return {
          statusCode: 200,
          contentType: this.options.registry.contentType,
          body: await this.options.registry.metrics()
        };
      default:
        return { statusCode: 404, contentType: 'text/plain', body: 'Not Found' };
    }
  }

  /**
   * Resolves with the bound port
   */
  listen(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        logger.info({ port: bound }, 'Health server listening');
        resolve(bound);
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
