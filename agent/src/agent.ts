/**
 * Composition root: turns an AgentConfig into a wired poll loop
 */

import type { AgentConfig } from '@git-rollout/config';
import {
  MappingTableSource,
  RepositoryMirror,
  resolveCredentials,
  runGit,
  type GitRunner
} from '@git-rollout/gitops';
import { RolloutClient, type DeploymentsApi } from '@git-rollout/k8s-rollout';
import { PollLoop } from './controller/poll-loop.js';
import { createAgentMetrics, observePollLoop, type AgentMetrics } from './metrics.js';
import { FileRevisionStore, MemoryRevisionStore, type RevisionStore } from './state/revision-store.js';

export interface AgentOverrides {
  gitRunner?: GitRunner;
  /** Cluster API; the default comes from the in-cluster or local kubeconfig */
  deploymentsApi?: DeploymentsApi;
  collectDefaultMetrics?: boolean;
}

export interface Agent {
  loop: PollLoop;
  metrics: AgentMetrics;
  store: RevisionStore;
}

export function createRevisionStore(config: AgentConfig): RevisionStore {
  return config.revisionStateFile
    ? new FileRevisionStore(config.revisionStateFile, { repository: config.git.repository, branch: config.git.branch })
    : new MemoryRevisionStore();
}

/**
 * Build every component. Rejects with ConfigError on bad credentials and
 * MappingError on an unusable mapping file.
 */
export async function createAgent(config: AgentConfig, overrides: AgentOverrides = {}): Promise<Agent> {
  const credentials = resolveCredentials({
    repository: config.git.repository,
    username: config.git.username,
    token: config.git.token,
    sshCommand: config.git.sshCommand
  });

  const mapping = await MappingTableSource.load({
    filePath: config.rollout.mappingFile,
    matchMode: config.mapping.matchMode,
    legacyDeployments: config.rollout.legacyDeployments
  });

  const rolloutOptions = {
    annotation: config.rollout.annotation,
    timeoutMs: config.rollout.kubeTimeoutMs
  };
  const rollout = overrides.deploymentsApi
    ? new RolloutClient(overrides.deploymentsApi, rolloutOptions)
    : RolloutClient.fromKubeConfig(rolloutOptions);

  const mirror = new RepositoryMirror({
    url: config.git.repository,
    branch: config.git.branch,
    localPath: config.git.cloneDir,
    credentials,
    timeoutMs: config.git.timeoutMs
  }, overrides.gitRunner ?? runGit);

  const store = createRevisionStore(config);

  const loop = new PollLoop({
    mirror,
    mapping,
    rollout,
    store,
    namespace: config.rollout.namespace,
    intervalMs: config.pollIntervalMs,
    concurrency: config.rollout.concurrency,
    retryLimit: config.rollout.retryLimit,
    reloadMapping: config.mapping.reload
  });

  const metrics = createAgentMetrics({ collectDefaults: overrides.collectDefaultMetrics });
  observePollLoop(loop, metrics);

  return { loop, metrics, store };
}
