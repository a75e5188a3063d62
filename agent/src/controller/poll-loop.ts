/**
 * Poll Loop
 *
 * One cycle: sync the mirror, resolve the changed paths against the mapping
 * table, restart the affected deployments. Cycles never overlap and the
 * interval is measured from the end of the previous cycle.
 *
 * Events:
 * - `state` (state, previous) on every transition
 * - `cycle` (CycleReport) after every cycle
 */

import { EventEmitter } from 'events';
import { resolve, type MappingTable, type SyncResult } from '@git-rollout/gitops';
import {
  classifyRolloutFailure,
  targetKey,
  type DeploymentTarget,
  type RolloutError,
  type RolloutResult
} from '@git-rollout/k8s-rollout';
import { createLogger } from '@git-rollout/logger';
import { ResourcePool, classifyError, type AgentError } from '@git-rollout/resilience';
import type { RevisionStore } from '../state/revision-store.js';
import { logAgentError } from '../utils/error-handler.js';

const logger = createLogger('poll-loop');

export type PollLoopState = 'idle' | 'syncing' | 'resolving' | 'triggering' | 'stopped';

export type CycleOutcome = 'sync-failed' | 'initialized' | 'no-change' | 'rolled-out';

export interface Mirror {
  sync(previousRevision: string | null, signal?: AbortSignal): Promise<SyncResult>;
}

export interface MappingProvider {
  current(): MappingTable;
  refresh(): Promise<boolean>;
}

export interface Restarter {
  restart(target: DeploymentTarget): Promise<RolloutResult>;
}

export type TargetOutcome =
  | { target: DeploymentTarget; status: 'restarted'; restartedAt: string; attempt: number }
  | { target: DeploymentTarget; status: 'failed'; error: RolloutError; attempt: number; willRetry: boolean };

export interface CycleReport {
  outcome: CycleOutcome;
  previousRevision: string | null;
  revision: string | null;
  changedPaths: string[];
  targets: TargetOutcome[];
  pendingRetries: number;
  durationMs: number;
  error?: AgentError;
}

export interface PollLoopStatus {
  state: PollLoopState;
  revision: string | null;
  /** A sync has succeeded at least once */
  ready: boolean;
  lastSyncFailed: boolean;
  consecutiveSyncFailures: number;
  lastSuccessAt?: Date;
  pendingRetries: number;
}

export interface PollLoopOptions {
  mirror: Mirror;
  mapping: MappingProvider;
  rollout: Restarter;
  store: RevisionStore;
  namespace: string;
  intervalMs: number;
  concurrency: number;
  /** Failed attempts after which a retryable restart is given up */
  retryLimit: number;
  /** Check the mapping file for changes before resolving */
  reloadMapping?: boolean;
  now?: () => Date;
}

interface PendingRetry {
  target: DeploymentTarget;
  attempts: number;
}

export class PollLoop extends EventEmitter {
  private readonly options: PollLoopOptions;
  private readonly pool: ResourcePool<RolloutResult>;
  private readonly pending = new Map<string, PendingRetry>();
  private readonly now: () => Date;

  private state: PollLoopState = 'idle';
  private stopped = false;
  private revision: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<CycleReport> | null = null;
  private syncController: AbortController | null = null;

  private ready = false;
  private lastSyncFailed = false;
  private consecutiveSyncFailures = 0;
  private lastSuccessAt?: Date;

  constructor(options: PollLoopOptions) {
    super();
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.pool = new ResourcePool<RolloutResult>({
      name: 'rollouts',
      maxConcurrency: options.concurrency
    });
  }

  /**
   * Load the stored revision and run the first cycle. A sync failure in
   * that cycle rejects, so a misconfigured remote stops the process.
   */
  async start(): Promise<CycleReport> {
    if (this.stopped) {
      throw new Error('Poll loop has been stopped');
    }

    this.revision = await this.options.store.load();
    logger.info({
      revision: this.revision,
      intervalMs: this.options.intervalMs,
      namespace: this.options.namespace
    }, 'Starting poll loop');

    const report = await this.cycle(true);
    this.schedule();
    return report;
  }

  /**
   * Run one cycle now. Recoverable errors are reported, never thrown.
   * A call while a cycle is in flight joins that cycle.
   */
  runCycle(): Promise<CycleReport> {
    return this.cycle(false);
  }

  /**
   * Cancel the timer, abort an in-flight sync and wait for the current cycle.
   * Restarts already triggered are allowed to finish.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.syncController?.abort();

    if (this.running) {
      await Promise.allSettled([this.running]);
    }

    this.pool.close();
    this.transition('stopped');
    logger.info({ revision: this.revision }, 'Poll loop stopped');
  }

  getState(): PollLoopState {
    return this.state;
  }

  getRevision(): string | null {
    return this.revision;
  }

  getStatus(): PollLoopStatus {
    return {
      state: this.state,
      revision: this.revision,
      ready: this.ready,
      lastSyncFailed: this.lastSyncFailed,
      consecutiveSyncFailures: this.consecutiveSyncFailures,
      lastSuccessAt: this.lastSuccessAt,
      pendingRetries: this.pending.size
    };
  }

  private cycle(strict: boolean): Promise<CycleReport> {
    if (this.running) {
      return this.running;
    }

    const running = this.executeCycle(strict).finally(() => {
      this.running = null;
    });
    this.running = running;
    return running;
  }

  private schedule(): void {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.cycle(false)
        .catch((error: unknown) => {
          logAgentError(classifyError(error, 'poll-cycle'));
        })
        .finally(() => this.schedule());
    }, this.options.intervalMs);
  }

  private transition(next: PollLoopState): void {
    if (this.state === next || (this.state === 'stopped' && next !== 'stopped')) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.emit('state', next, previous);
  }

  private async executeCycle(strict: boolean): Promise<CycleReport> {
    const startedAt = Date.now();
    const previousRevision = this.revision;

    const finish = (report: Omit<CycleReport, 'durationMs' | 'pendingRetries' | 'previousRevision'>): CycleReport => {
      if (!this.stopped) {
        this.transition('idle');
      }
      const full: CycleReport = {
        ...report,
        previousRevision,
        pendingRetries: this.pending.size,
        durationMs: Date.now() - startedAt
      };
      this.emit('cycle', full);
      return full;
    };

    // Syncing
    this.transition('syncing');
    const controller = new AbortController();
    this.syncController = controller;

    let sync: SyncResult;
    try {
      sync = await this.options.mirror.sync(previousRevision, controller.signal);
    } catch (error) {
      const agentError = classifyError(error, 'sync');
      this.lastSyncFailed = true;
      this.consecutiveSyncFailures++;

      if (strict && !this.stopped) {
        this.transition('idle');
        throw agentError;
      }

      if (this.stopped) {
        logger.info({ revision: previousRevision }, 'Sync interrupted by shutdown');
      } else {
        logAgentError(agentError, {
          revision: previousRevision,
          consecutiveFailures: this.consecutiveSyncFailures
        });
      }
      return finish({
        outcome: 'sync-failed',
        revision: previousRevision,
        changedPaths: [],
        targets: [],
        error: agentError
      });
    } finally {
      this.syncController = null;
    }

    this.revision = sync.newRevision;
    this.ready = true;
    this.lastSyncFailed = false;
    this.consecutiveSyncFailures = 0;
    this.lastSuccessAt = this.now();

    if (sync.initial) {
      logger.info({ revision: sync.newRevision }, 'Initial revision recorded, no rollouts on first observation');
      await this.persist(sync.newRevision, previousRevision);
      return finish({ outcome: 'initialized', revision: sync.newRevision, changedPaths: [], targets: [] });
    }

    // Resolving
    this.transition('resolving');
    const { targets, fresh } = await this.resolveTargets(sync.changedPaths);

    if (targets.length === 0) {
      if (sync.changedPaths.length > 0) {
        logger.info({ changedPaths: sync.changedPaths.length, revision: sync.newRevision }, 'Changes matched no deployment');
      } else {
        logger.debug({ revision: sync.newRevision }, 'No upstream changes');
      }
      await this.persist(sync.newRevision, previousRevision);
      return finish({ outcome: 'no-change', revision: sync.newRevision, changedPaths: sync.changedPaths, targets: [] });
    }

    // Triggering
    this.transition('triggering');
    const outcomes = await this.trigger(targets, fresh);

    await this.persist(sync.newRevision, previousRevision);

    const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
    logger.info({
      previousRevision,
      revision: sync.newRevision,
      changedPaths: sync.changedPaths.length,
      restarted: outcomes.length - failed,
      failed,
      pendingRetries: this.pending.size
    }, 'Rollout cycle finished');

    return finish({ outcome: 'rolled-out', revision: sync.newRevision, changedPaths: sync.changedPaths, targets: outcomes });
  }

  /**
   * Deployments affected by the change set, followed by pending retries
   * that the change set did not already cover
   */
  private async resolveTargets(changedPaths: string[]): Promise<{ targets: DeploymentTarget[]; fresh: Set<string> }> {
    if (this.options.reloadMapping) {
      try {
        await this.options.mapping.refresh();
      } catch (error) {
        logAgentError(classifyError(error, 'mapping-refresh'));
      }
    }

    const resolved = resolve(changedPaths, this.options.mapping.current(), this.options.namespace);
    const fresh = new Set(resolved.map(targetKey));
    const retries = [...this.pending.values()]
      .filter((retry) => !fresh.has(targetKey(retry.target)))
      .map((retry) => retry.target);

    if (resolved.length > 0) {
      logger.info({ deployments: resolved.map((target) => target.name), retries: retries.length }, 'Deployments affected by change');
    }
    return { targets: [...resolved, ...retries], fresh };
  }

  private async trigger(targets: DeploymentTarget[], freshKeys: Set<string>): Promise<TargetOutcome[]> {
    const settled = await this.pool.settleAll(
      targets.map((target) => () => this.options.rollout.restart(target))
    );

    return settled.map((result, index): TargetOutcome => {
      const target = targets[index];
      const key = targetKey(target);
      // A new change to the same deployment starts its attempts over
      const attempt = (freshKeys.has(key) ? 0 : this.pending.get(key)?.attempts ?? 0) + 1;

      if (result.status === 'fulfilled') {
        this.pending.delete(key);
        return { target, status: 'restarted', restartedAt: result.value.restartedAt, attempt };
      }

      const error = classifyRolloutFailure(target, result.reason);
      const willRetry = error.retryable && attempt < this.options.retryLimit;

      if (willRetry) {
        this.pending.set(key, { target, attempts: attempt });
        logAgentError(error, { attempt, retryLimit: this.options.retryLimit });
      } else {
        this.pending.delete(key);
        if (error.retryable) {
          logger.error({
            namespace: target.namespace,
            deployment: target.name,
            attempts: attempt,
            error: error.message
          }, 'Giving up on rollout restart after repeated failures');
        } else {
          logAgentError(error, { attempt });
        }
      }

      return { target, status: 'failed', error, attempt, willRetry };
    });
  }

  private async persist(revision: string, previousRevision: string | null): Promise<void> {
    if (revision === previousRevision) {
      return;
    }

    try {
      await this.options.store.save(revision);
    } catch (error) {
      logAgentError(classifyError(error, 'revision-store'), { revision });
    }
  }
}
