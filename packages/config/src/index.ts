import { z } from 'zod';
import { AgentError } from '@git-rollout/resilience';

/**
 * Startup configuration error. Never retried: the process exits and the
 * orchestrator restarts it once the configuration is fixed.
 */
export class ConfigError extends AgentError {
  readonly type = 'CONFIG_ERROR';
  readonly retryable = false;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      'INVALID_CONFIGURATION',
      { issues }
    );
    this.issues = issues;
  }
}

// Unset and empty variables are the same thing in a pod spec
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const flag = (fallback: boolean) => z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.enum(['true', 'false', '1', '0', 'yes', 'no']).default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
);

const positiveInt = (fallback: number) => z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().int().positive().default(fallback)
);

// Node clamps timer delays above 2^31-1 ms to 1 ms
const MAX_TIMER_SECONDS = Math.floor(0x7fffffff / 1000);

const seconds = (fallback: number) => z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().int().positive()
    .max(MAX_TIMER_SECONDS, `must be at most ${MAX_TIMER_SECONDS} seconds`)
    .default(fallback)
);

const envSchema = z.object({
  GIT_REPO: z.string({ required_error: 'GIT_REPO is required' }).trim().min(1, 'GIT_REPO is required'),
  GIT_BRANCH: optionalString.transform((value) => value ?? 'main'),
  POLL_INTERVAL: seconds(60),
  GIT_USERNAME: optionalString,
  GIT_TOKEN: optionalString,
  GIT_SSH_COMMAND: optionalString,
  GIT_CLONE_DIR: optionalString.transform((value) => value ?? '/tmp/datadirsync/repo'),
  GIT_TIMEOUT: seconds(120),
  ROLLOUT_NAMESPACE: optionalString.transform((value) => value ?? 'default'),
  ROLLOUT_MAPPING_FILE: optionalString.transform((value) => value ?? '/tmp/datadirsync/rollout_mapping_config.yaml'),
  ROLLOUT_DEPLOYMENTS: optionalString.transform((value) =>
    (value ?? '').split(',').map((name) => name.trim()).filter((name) => name.length > 0)
  ),
  ROLLOUT_ANNOTATION: optionalString.transform((value) => value ?? 'kubectl.kubernetes.io/restartedAt'),
  ROLLOUT_CONCURRENCY: positiveInt(4),
  ROLLOUT_RETRY_LIMIT: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().min(0).default(3)
  ),
  KUBE_TIMEOUT: seconds(30),
  MAPPING_MATCH_MODE: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.enum(['segment', 'prefix']).default('segment')
  ),
  MAPPING_RELOAD: flag(true),
  // An explicitly empty value disables persistence, so no preprocess here
  REVISION_STATE_FILE: z.string().trim().default('/tmp/datadirsync/revision-state.json'),
  AGENT_HTTP_PORT: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().min(0).max(65535).default(8080)
  ),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
});

export type Env = z.infer<typeof envSchema>;

export type MatchMode = Env['MAPPING_MATCH_MODE'];

export interface AgentConfig {
  git: {
    repository: string;
    branch: string;
    username?: string;
    token?: string;
    sshCommand?: string;
    cloneDir: string;
    timeoutMs: number;
  };
  rollout: {
    namespace: string;
    mappingFile: string;
    legacyDeployments: string[];
    annotation: string;
    concurrency: number;
    retryLimit: number;
    kubeTimeoutMs: number;
  };
  mapping: {
    matchMode: MatchMode;
    reload: boolean;
  };
  pollIntervalMs: number;
  /** Undefined keeps the revision in memory only */
  revisionStateFile?: string;
  httpPort: number;
  logLevel: Env['LOG_LEVEL'];
}

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse the environment into a typed configuration.
 * GIT_REPO_URL is read when GIT_REPO is unset.
 */
export function parseEnv(source: EnvSource = process.env): Env {
  const result = envSchema.safeParse({
    ...source,
    GIT_REPO: source.GIT_REPO?.trim() || source.GIT_REPO_URL
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigError('Invalid configuration', issues);
  }

  return result.data;
}

export function loadConfig(source: EnvSource = process.env): AgentConfig {
  const env = parseEnv(source);

  return {
    git: {
      repository: env.GIT_REPO,
      branch: env.GIT_BRANCH,
      username: env.GIT_USERNAME,
      token: env.GIT_TOKEN,
      sshCommand: env.GIT_SSH_COMMAND,
      cloneDir: env.GIT_CLONE_DIR,
      timeoutMs: env.GIT_TIMEOUT * 1000,
    },
    rollout: {
      namespace: env.ROLLOUT_NAMESPACE,
      mappingFile: env.ROLLOUT_MAPPING_FILE,
      legacyDeployments: env.ROLLOUT_DEPLOYMENTS,
      annotation: env.ROLLOUT_ANNOTATION,
      concurrency: env.ROLLOUT_CONCURRENCY,
      retryLimit: env.ROLLOUT_RETRY_LIMIT,
      kubeTimeoutMs: env.KUBE_TIMEOUT * 1000,
    },
    mapping: {
      matchMode: env.MAPPING_MATCH_MODE,
      reload: env.MAPPING_RELOAD,
    },
    pollIntervalMs: env.POLL_INTERVAL * 1000,
    revisionStateFile: env.REVISION_STATE_FILE === '' ? undefined : env.REVISION_STATE_FILE,
    httpPort: env.AGENT_HTTP_PORT,
    logLevel: env.LOG_LEVEL,
  };
}
