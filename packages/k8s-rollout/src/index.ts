export { RolloutClient, classifyRolloutFailure, DEFAULT_RESTART_ANNOTATION } from './rollout-client.js';
export type { RolloutClientOptions } from './rollout-client.js';
export { RolloutError } from './errors.js';
export type { RolloutFailureReason } from './errors.js';
export { targetKey } from './types.js';
export type { DeploymentTarget, DeploymentsApi, RolloutResult } from './types.js';
