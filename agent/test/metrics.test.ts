import { describe, it, expect, beforeEach } from 'vitest';
import { GitError } from '@git-rollout/gitops';
import { RolloutError } from '@git-rollout/k8s-rollout';
import type { CycleReport } from '../src/controller/poll-loop.js';
import { createAgentMetrics, recordCycle, type AgentMetrics } from '../src/metrics.js';

function report(overrides: Partial<CycleReport>): CycleReport {
  return {
    outcome: 'no-change',
    previousRevision: 'c001',
    revision: 'c001',
    changedPaths: [],
    targets: [],
    pendingRetries: 0,
    durationMs: 250,
    ...overrides
  };
}

describe('agent metrics', () => {
  let metrics: AgentMetrics;

  beforeEach(() => {
    metrics = createAgentMetrics({ collectDefaults: false });
  });

  it('counts cycles by outcome', async () => {
    recordCycle(metrics, report({ outcome: 'no-change' }));
    recordCycle(metrics, report({ outcome: 'no-change' }));

    const cycles = await metrics.cycles.get();
    expect(cycles.values).toEqual([{ value: 2, labels: { outcome: 'no-change' } }]);
  });

  it('counts restarts per deployment and result', async () => {
    const geoserver = { namespace: 'web', name: 'geoserver' };
    const header = { namespace: 'web', name: 'header' };

    recordCycle(metrics, report({
      outcome: 'rolled-out',
      revision: 'c002',
      targets: [
        { target: geoserver, status: 'restarted', restartedAt: '2026-03-01T12:00:00.000Z', attempt: 1 },
        {
          target: header,
          status: 'failed',
          error: new RolloutError(header, 'unavailable', 'service unavailable', { statusCode: 503 }),
          attempt: 1,
          willRetry: true
        }
      ],
      pendingRetries: 1
    }));

    const restarts = await metrics.restarts.get();
    expect(restarts.values).toEqual([
      { value: 1, labels: { deployment: 'geoserver', status: 'success' } },
      { value: 1, labels: { deployment: 'header', status: 'failure' } }
    ]);
    expect((await metrics.pendingRetries.get()).values[0]?.value).toBe(1);
  });

  it('tracks sync failures without touching the last success time', async () => {
    recordCycle(metrics, report({ outcome: 'sync-failed', error: new GitError('fetch', 'Could not resolve host') }));

    expect((await metrics.syncFailures.get()).values[0]?.value).toBe(1);
    expect((await metrics.lastSuccess.get()).values[0]?.value ?? 0).toBe(0);
  });

  it('stamps the last success time on a successful sync', async () => {
    const before = Date.now() / 1000;
    recordCycle(metrics, report({ outcome: 'initialized' }));

    const stamp = (await metrics.lastSuccess.get()).values[0]?.value ?? 0;
    expect(stamp).toBeGreaterThanOrEqual(Math.floor(before));
  });

  it('exposes every series in the text format', async () => {
    recordCycle(metrics, report({ outcome: 'initialized', durationMs: 1500 }));

    const text = await metrics.registry.metrics();
    expect(text).toContain('git_rollout_cycles_total{outcome="initialized"} 1');
    expect(text).toContain('git_rollout_cycle_duration_seconds_bucket{le="2"} 1');
    expect(text).toContain('git_rollout_cycle_duration_seconds_sum 1.5');
    expect(text).toContain('# TYPE git_rollout_sync_failures_total counter');
    expect(text).toContain('# TYPE git_rollout_restarts_total counter');
  });
});
