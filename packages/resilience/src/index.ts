export {
  AgentError,
  TimeoutError,
  UnknownError,
  classifyError,
  errorMessage
} from './errors.js';

export type {
  AgentErrorType,
  SerializedAgentError
} from './errors.js';

export { withTimeout } from './timeout.js';

// Bulkhead exports
export {
  ResourcePool,
  ResourcePoolRejectedError
} from './bulkhead/resource-isolation.js';

export type {
  ResourcePoolConfig,
  SettledOperation
} from './bulkhead/resource-isolation.js';
