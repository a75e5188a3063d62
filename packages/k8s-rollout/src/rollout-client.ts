/**
 * Rollout Client
 * Restarts a Deployment the way `kubectl rollout restart` does: by stamping
 * the pod template with a fresh annotation. The object is never recreated
 * or scaled, and a second stamp simply supersedes the first rollout.
 */

import * as k8s from '@kubernetes/client-node';
import { createLogger } from '@git-rollout/logger';
import { TimeoutError, errorMessage, withTimeout } from '@git-rollout/resilience';
import { RolloutError, type RolloutFailureReason } from './errors.js';
import { targetKey, type DeploymentTarget, type DeploymentsApi, type RolloutResult } from './types.js';

const logger = createLogger('rollout-client');

export const DEFAULT_RESTART_ANNOTATION = 'kubectl.kubernetes.io/restartedAt';

const STRATEGIC_MERGE_PATCH = { headers: { 'Content-Type': 'application/strategic-merge-patch+json' } };

export interface RolloutClientOptions {
  annotation?: string;
  /** Upper bound for one patch call */
  timeoutMs: number;
  fieldManager?: string;
  now?: () => Date;
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function apiMessageOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const body = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
  }
  return errorMessage(error);
}

/**
 * Map an API failure onto a rollout failure reason
 */
export function classifyRolloutFailure(target: DeploymentTarget, error: unknown): RolloutError {
  if (error instanceof RolloutError) {
    return error;
  }

  if (error instanceof TimeoutError) {
    return new RolloutError(target, 'unavailable', error.message, { cause: error });
  }

  const statusCode = statusCodeOf(error);
  const message = apiMessageOf(error);
  let reason: RolloutFailureReason;

  if (statusCode === undefined) {
    // No HTTP answer at all: connection refused, DNS, TLS
    reason = 'unavailable';
  } else if (statusCode === 404) {
    reason = 'not-found';
  } else if (statusCode === 401 || statusCode === 403) {
    reason = 'forbidden';
  } else if (statusCode >= 500 || statusCode === 429 || statusCode === 408) {
    reason = 'unavailable';
  } else {
    reason = 'rejected';
  }

  const detail = reason === 'forbidden'
    ? `${message} (grant get/patch on deployments in namespace ${target.namespace} to the agent's service account)`
    : message;

  return new RolloutError(target, reason, detail, { statusCode, cause: error });
}

export class RolloutClient {
  private readonly api: DeploymentsApi;
  private readonly annotation: string;
  private readonly timeoutMs: number;
  private readonly fieldManager: string;
  private readonly now: () => Date;

  constructor(api: DeploymentsApi, options: RolloutClientOptions) {
    this.api = api;
    this.annotation = options.annotation ?? DEFAULT_RESTART_ANNOTATION;
    this.timeoutMs = options.timeoutMs;
    this.fieldManager = options.fieldManager ?? 'git-rollout-agent';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Client for the cluster the agent runs in, or the local kubeconfig
   */
  static fromKubeConfig(options: RolloutClientOptions): RolloutClient {
    const kc = new k8s.KubeConfig();
    kc.loadFromDefault();

    logger.info({ context: kc.getCurrentContext(), annotation: options.annotation }, 'Kubernetes client initialized');
    return new RolloutClient(kc.makeApiClient(k8s.AppsV1Api), options);
  }

  /**
   * Restart one deployment. Rejects with RolloutError.
   */
  async restart(target: DeploymentTarget): Promise<RolloutResult> {
    const restartedAt = this.now().toISOString();
    const patch = {
      spec: {
        template: {
          metadata: {
            annotations: { [this.annotation]: restartedAt }
          }
        }
      }
    };

    try {
      await withTimeout(`restart ${targetKey(target)}`, this.timeoutMs, () =>
        this.api.patchNamespacedDeployment(
          target.name,
          target.namespace,
          patch,
          undefined,
          undefined,
          this.fieldManager,
          undefined,
          undefined,
          STRATEGIC_MERGE_PATCH
        )
      );
    } catch (error) {
      throw classifyRolloutFailure(target, error);
    }

    logger.info({ namespace: target.namespace, deployment: target.name, restartedAt }, 'Rollout restart triggered');
    return { target, restartedAt };
  }
}
