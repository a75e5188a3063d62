/**
 * Error taxonomy shared by every agent package.
 *
 * Each error says whether retrying the same operation on the next poll cycle
 * can succeed; the poll loop and the rollout retry set key off `retryable`.
 */

export type AgentErrorType =
  | 'CONFIG_ERROR'
  | 'MAPPING_ERROR'
  | 'GIT_ERROR'
  | 'ROLLOUT_ERROR'
  | 'TIMEOUT_ERROR'
  | 'UNKNOWN_ERROR';

export interface SerializedAgentError {
  type: AgentErrorType;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
  timestamp: string;
  retryable: boolean;
}

/**
 * Base agent error class
 */
export abstract class AgentError extends Error {
  abstract readonly type: AgentErrorType;
  abstract readonly retryable: boolean;
  readonly timestamp: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code?: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): SerializedAgentError {
    return {
      type: this.type,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      retryable: this.retryable
    };
  }
}

/**
 * Timeout error - operation took too long
 */
export class TimeoutError extends AgentError {
  readonly type = 'TIMEOUT_ERROR';
  readonly retryable = true;

  constructor(
    operation: string,
    timeout: number,
    details?: Record<string, unknown>
  ) {
    super(
      `Operation '${operation}' timed out after ${timeout}ms`,
      'OPERATION_TIMEOUT',
      { operation, timeout, ...details }
    );
  }
}

/**
 * Unknown error - unexpected failure
 */
export class UnknownError extends AgentError {
  readonly type = 'UNKNOWN_ERROR';
  readonly retryable = true;

  constructor(
    originalError: Error,
    context?: string,
    details?: Record<string, unknown>
  ) {
    super(
      `Unknown error${context ? ` in ${context}` : ''}: ${originalError.message}`,
      'UNKNOWN_FAILURE',
      { originalError: originalError.message, ...details },
      { cause: originalError }
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalise anything thrown into an AgentError
 */
export function classifyError(error: unknown, context?: string): AgentError {
  if (error instanceof AgentError) {
    return error;
  }

  if (error instanceof Error) {
    return new UnknownError(error, context);
  }

  return new UnknownError(
    new Error(String(error)),
    context ?? 'non-error-thrown',
    { valueType: typeof error }
  );
}
