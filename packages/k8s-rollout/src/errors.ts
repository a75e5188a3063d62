import { AgentError } from '@git-rollout/resilience';
import type { DeploymentTarget } from './types.js';

export type RolloutFailureReason = 'not-found' | 'forbidden' | 'unavailable' | 'rejected';

/**
 * Rollout error - one deployment could not be restarted.
 * Scoped to its target: the other targets of the cycle are unaffected.
 */
export class RolloutError extends AgentError {
  readonly type = 'ROLLOUT_ERROR';
  readonly retryable: boolean;
  readonly reason: RolloutFailureReason;
  readonly target: DeploymentTarget;
  readonly statusCode?: number;

  constructor(
    target: DeploymentTarget,
    reason: RolloutFailureReason,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(
      `Rollout restart of ${target.namespace}/${target.name} failed: ${message}`,
      `ROLLOUT_${reason.toUpperCase().replace('-', '_')}`,
      { namespace: target.namespace, deployment: target.name, reason, statusCode: options.statusCode },
      { cause: options.cause }
    );
    this.reason = reason;
    this.target = target;
    this.statusCode = options.statusCode;
    this.retryable = reason === 'unavailable';
  }
}
