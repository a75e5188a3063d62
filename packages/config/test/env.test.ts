import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseEnv } from '../src/index.js';

const base = {
  GIT_REPO: 'https://git.example.com/platform/site-config.git'
};

describe('loadConfig', () => {
  it('applies defaults for everything but the repository', () => {
    expect(loadConfig(base)).toEqual({
      git: {
        repository: 'https://git.example.com/platform/site-config.git',
        branch: 'main',
        username: undefined,
        token: undefined,
        sshCommand: undefined,
        cloneDir: '/tmp/datadirsync/repo',
        timeoutMs: 120_000
      },
      rollout: {
        namespace: 'default',
        mappingFile: '/tmp/datadirsync/rollout_mapping_config.yaml',
        legacyDeployments: [],
        annotation: 'kubectl.kubernetes.io/restartedAt',
        concurrency: 4,
        retryLimit: 3,
        kubeTimeoutMs: 30_000
      },
      mapping: {
        matchMode: 'segment',
        reload: true
      },
      pollIntervalMs: 60_000,
      revisionStateFile: '/tmp/datadirsync/revision-state.json',
      httpPort: 8080,
      logLevel: 'info'
    });
  });

  it('reads every supported variable', () => {
    const config = loadConfig({
      ...base,
      GIT_BRANCH: 'release',
      POLL_INTERVAL: '15',
      GIT_USERNAME: 'ci-bot',
      GIT_TOKEN: 'test-token',
      GIT_CLONE_DIR: '/data/repo',
      GIT_TIMEOUT: '45',
      ROLLOUT_NAMESPACE: 'maps',
      ROLLOUT_MAPPING_FILE: '/etc/rollout/mapping.yaml',
      ROLLOUT_DEPLOYMENTS: ' geoserver, ,nginx ',
      ROLLOUT_CONCURRENCY: '2',
      ROLLOUT_RETRY_LIMIT: '0',
      KUBE_TIMEOUT: '5',
      MAPPING_MATCH_MODE: 'prefix',
      MAPPING_RELOAD: 'false',
      REVISION_STATE_FILE: '',
      AGENT_HTTP_PORT: '0',
      LOG_LEVEL: 'debug'
    });

    expect(config.git).toMatchObject({
      branch: 'release',
      username: 'ci-bot',
      token: 'test-token',
      cloneDir: '/data/repo',
      timeoutMs: 45_000
    });
    expect(config.rollout).toMatchObject({
      namespace: 'maps',
      mappingFile: '/etc/rollout/mapping.yaml',
      legacyDeployments: ['geoserver', 'nginx'],
      concurrency: 2,
      retryLimit: 0,
      kubeTimeoutMs: 5_000
    });
    expect(config.mapping).toEqual({ matchMode: 'prefix', reload: false });
    expect(config.pollIntervalMs).toBe(15_000);
    expect(config.revisionStateFile).toBeUndefined();
    expect(config.httpPort).toBe(0);
    expect(config.logLevel).toBe('debug');
  });

  it('treats empty variables as unset', () => {
    const config = loadConfig({ ...base, GIT_BRANCH: '', POLL_INTERVAL: '', GIT_SSH_COMMAND: '  ' });
    expect(config.git.branch).toBe('main');
    expect(config.git.sshCommand).toBeUndefined();
    expect(config.pollIntervalMs).toBe(60_000);
  });

  it('falls back to GIT_REPO_URL', () => {
    const config = loadConfig({ GIT_REPO_URL: 'git@git.example.com:platform/site-config.git' });
    expect(config.git.repository).toBe('git@git.example.com:platform/site-config.git');
  });

  it('fails with ConfigError when the repository is missing', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ GIT_REPO: '   ' })).toThrow(/GIT_REPO is required/);
  });

  it('lists every invalid variable', () => {
    try {
      parseEnv({ ...base, POLL_INTERVAL: 'soon', MAPPING_MATCH_MODE: 'glob' });
      expect.unreachable('parseEnv should have thrown');
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      const issues = error.issues;
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^POLL_INTERVAL: /);
      expect(issues[1]).toMatch(/^MAPPING_MATCH_MODE: /);
      expect(error.retryable).toBe(false);
    }
  });

  it('rejects a non-positive poll interval', () => {
    expect(() => loadConfig({ ...base, POLL_INTERVAL: '0' })).toThrow(ConfigError);
  });

  it.each(['POLL_INTERVAL', 'GIT_TIMEOUT', 'KUBE_TIMEOUT'])('rejects a %s beyond the timer range', (key) => {
    expect(() => loadConfig({ ...base, [key]: '2592000' }))
      .toThrow(`Invalid configuration: ${key}: must be at most 2147483 seconds`);
  });

  it('accepts the longest interval a timer can hold', () => {
    const config = loadConfig({ ...base, POLL_INTERVAL: '2147483', KUBE_TIMEOUT: '2147483' });

    expect(config.pollIntervalMs).toBe(2147483000);
    expect(config.rollout.kubeTimeoutMs).toBe(2147483000);
  });
});
