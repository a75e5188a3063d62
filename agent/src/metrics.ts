import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { CycleReport, PollLoop } from './controller/poll-loop.js';

/**
 * Prometheus metrics of the agent, on a registry of their own
 */
export interface AgentMetrics {
  registry: Registry;
  cycles: Counter<'outcome'>;
  syncFailures: Counter;
  restarts: Counter<'deployment' | 'status'>;
  cycleDuration: Histogram;
  pendingRetries: Gauge;
  lastSuccess: Gauge;
}

export function createAgentMetrics(options: { collectDefaults?: boolean } = {}): AgentMetrics {
  const registry = new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  return {
    registry,
    cycles: new Counter({
      name: 'git_rollout_cycles_total',
      help: 'Poll cycles by outcome',
      labelNames: ['outcome'],
      registers: [registry]
    }),
    syncFailures: new Counter({
      name: 'git_rollout_sync_failures_total',
      help: 'Poll cycles whose git sync failed',
      registers: [registry]
    }),
    restarts: new Counter({
      name: 'git_rollout_restarts_total',
      help: 'Deployment restart attempts by result',
      labelNames: ['deployment', 'status'],
      registers: [registry]
    }),
    cycleDuration: new Histogram({
      name: 'git_rollout_cycle_duration_seconds',
      help: 'Duration of a poll cycle in seconds',
      buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
      registers: [registry]
    }),
    pendingRetries: new Gauge({
      name: 'git_rollout_pending_retries',
      help: 'Restarts waiting to be retried',
      registers: [registry]
    }),
    lastSuccess: new Gauge({
      name: 'git_rollout_last_success_timestamp_seconds',
      help: 'Unix time of the last successful sync',
      registers: [registry]
    })
  };
}

export function recordCycle(metrics: AgentMetrics, report: CycleReport): void {
  metrics.cycles.inc({ outcome: report.outcome });
  metrics.cycleDuration.observe(report.durationMs / 1000);
  metrics.pendingRetries.set(report.pendingRetries);

  if (report.outcome === 'sync-failed') {
    metrics.syncFailures.inc();
    return;
  }

  metrics.lastSuccess.setToCurrentTime();
  for (const outcome of report.targets) {
    metrics.restarts.inc({
      deployment: outcome.target.name,
      status: outcome.status === 'restarted' ? 'success' : 'failure'
    });
  }
}

export function observePollLoop(loop: PollLoop, metrics: AgentMetrics): void {
  loop.on('cycle', (report: CycleReport) => recordCycle(metrics, report));
}
