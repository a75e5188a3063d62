import { logger } from './index.js';

export type HealthStatus = 'healthy' | 'unhealthy' | 'degraded';

export interface HealthCheckResult {
  status: HealthStatus;
  message?: string;
  responseTime?: number;
  details?: Record<string, unknown>;
}

export interface ServiceHealth {
  service: string;
  status: HealthStatus;
  uptime: number;
  timestamp: string;
  version: string;
  checks: Record<string, HealthCheckResult>;
  overall: HealthCheckResult;
}

export type HealthCheck = () => Promise<HealthCheckResult>;

export interface HealthCheckOptions {
  /** A failing non-critical check only degrades the service. Default true. */
  critical?: boolean;
}

export interface HealthCheckerOptions {
  version?: string;
  timeoutMs?: number;
}

interface RegisteredCheck {
  run: HealthCheck;
  critical: boolean;
}

/**
 * Runs the registered checks in parallel and folds them into one status.
 * A check that throws or outlives the timeout counts as unhealthy.
 */
export class HealthChecker {
  private readonly checks = new Map<string, RegisteredCheck>();
  private readonly startedAt = Date.now();
  private readonly version: string;
  private readonly timeoutMs: number;

  constructor(private readonly serviceName: string, options: HealthCheckerOptions = {}) {
    this.version = options.version ?? '0.0.0';
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  register(name: string, check: HealthCheck, options: HealthCheckOptions = {}): void {
    this.checks.set(name, { run: check, critical: options.critical ?? true });
  }

  async check(): Promise<ServiceHealth> {
    const started = Date.now();
    const entries = await Promise.all(
      [...this.checks].map(async ([name, check]) => [name, await this.runCheck(check.run)] as const)
    );
    const results = Object.fromEntries(entries);
    const overall = this.summarize(results);

    const health: ServiceHealth = {
      service: this.serviceName,
      status: overall.status,
      uptime: Date.now() - this.startedAt,
      timestamp: new Date().toISOString(),
      version: this.version,
      checks: results,
      overall: { ...overall, responseTime: Date.now() - started }
    };

    if (overall.status === 'unhealthy') {
      logger.error({ checks: results }, overall.message);
    } else if (overall.status === 'degraded') {
      logger.warn({ checks: results }, overall.message);
    }

    return health;
  }

  private async runCheck(check: HealthCheck): Promise<HealthCheckResult> {
    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<HealthCheckResult>((resolve) => {
      timer = setTimeout(() => resolve({ status: 'unhealthy', message: 'Health check timeout' }), this.timeoutMs);
    });

    try {
      const result = await Promise.race([check(), timeout]);
      return { ...result, responseTime: result.responseTime ?? Date.now() - started };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : String(error),
        responseTime: Date.now() - started
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private summarize(results: Record<string, HealthCheckResult>): HealthCheckResult & { message: string } {
    const failing: string[] = [];
    const degraded: string[] = [];

    for (const [name, result] of Object.entries(results)) {
      const critical = this.checks.get(name)?.critical ?? true;
      if (result.status === 'unhealthy' && critical) {
        failing.push(name);
      } else if (result.status !== 'healthy') {
        degraded.push(name);
      }
    }

    if (failing.length > 0) {
      return { status: 'unhealthy', message: `Failing checks: ${failing.join(', ')}` };
    }
    if (degraded.length > 0) {
      return { status: 'degraded', message: `Degraded checks: ${degraded.join(', ')}` };
    }
    return { status: 'healthy', message: 'All checks passed' };
  }
}

export interface MemoryCheckOptions {
  budgetMB: number;
  /** Fractions of the budget */
  degradedAt?: number;
  unhealthyAt?: number;
}

/** Heap usage against a fixed budget */
export function memoryCheck(options: MemoryCheckOptions): HealthCheck {
  const { budgetMB, degradedAt = 0.75, unhealthyAt = 0.9 } = options;

  return async () => {
    const usage = process.memoryUsage();
    const usedMB = usage.heapUsed / 1024 / 1024;
    const ratio = usedMB / budgetMB;
    const status: HealthStatus = ratio > unhealthyAt ? 'unhealthy' : ratio > degradedAt ? 'degraded' : 'healthy';

    return {
      status,
      message: `Heap ${usedMB.toFixed(1)}MB of ${budgetMB}MB`,
      details: {
        heapUsedMB: Number(usedMB.toFixed(1)),
        rssMB: Number((usage.rss / 1024 / 1024).toFixed(1)),
        budgetMB
      }
    };
  };
}
