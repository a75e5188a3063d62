/**
 * Structured logging for recoverable errors of the poll loop
 */

import { createLogger } from '@git-rollout/logger';
import type { AgentError } from '@git-rollout/resilience';

const logger = createLogger('error-handler');

/**
 * Retryable errors are warnings: the next cycle tries again.
 * Anything that needs an operator is an error.
 */
export function logAgentError(error: AgentError, context: Record<string, unknown> = {}): void {
  const logContext = {
    ...context,
    errorType: error.type,
    errorCode: error.code,
    retryable: error.retryable,
    timestamp: error.timestamp,
    details: error.details
  };

  if (error.retryable) {
    logger.warn(logContext, `Retryable error: ${error.message}`);
  } else {
    logger.error(logContext, `Non-retryable error: ${error.message}`);
  }
}
