import { AgentError } from '@git-rollout/resilience';

/**
 * Git error - fetch, diff or checkout failed during a poll cycle.
 * Always retryable: the next cycle starts again from the last good revision.
 */
export class GitError extends AgentError {
  readonly type = 'GIT_ERROR';
  readonly retryable = true;
  readonly operation: string;
  readonly aborted: boolean;

  constructor(
    operation: string,
    message: string,
    options: {
      code?: string;
      aborted?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(
      `Git ${operation} failed: ${message}`,
      options.code ?? 'GIT_COMMAND_FAILED',
      { operation, ...options.details },
      { cause: options.cause }
    );
    this.operation = operation;
    this.aborted = options.aborted ?? false;
  }
}

/**
 * Mapping error - the mapping file cannot produce a usable table.
 * Raised at load time only; malformed single rules are skipped instead.
 */
export class MappingError extends AgentError {
  readonly type = 'MAPPING_ERROR';
  readonly retryable = false;

  constructor(source: string, message: string, cause?: unknown) {
    super(
      `Invalid rollout mapping in ${source}: ${message}`,
      'INVALID_MAPPING',
      { source },
      { cause }
    );
  }
}
