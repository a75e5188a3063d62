import { ConfigError } from '@git-rollout/config';

/**
 * How the mirror authenticates against the remote. Resolved once at startup.
 */
export type GitCredentials =
  | { kind: 'anonymous' }
  | { kind: 'basic'; username: string; token: string }
  | { kind: 'ssh'; command: string };

export interface CredentialInput {
  repository: string;
  username?: string;
  token?: string;
  sshCommand?: string;
}

const USERINFO_PATTERN = /([a-z][a-z0-9+.-]*:\/\/)[^@/\s]+@/gi;

/**
 * Hide the userinfo part of every URL in a string
 */
export function redactUrl(text: string): string {
  return text.replace(USERINFO_PATTERN, '$1***@');
}

function isHttpUrl(repository: string): boolean {
  try {
    const { protocol } = new URL(repository);
    return protocol === 'https:' || protocol === 'http:';
  } catch {
    return false;
  }
}

/**
 * Pick the credential mode: an SSH command wins, then username/token,
 * then anonymous access.
 */
export function resolveCredentials(input: CredentialInput): GitCredentials {
  if (input.sshCommand) {
    return { kind: 'ssh', command: input.sshCommand };
  }

  if (input.username && input.token) {
    if (!isHttpUrl(input.repository)) {
      throw new ConfigError('GIT_USERNAME/GIT_TOKEN need an http(s) repository URL', [
        `GIT_REPO: ${redactUrl(input.repository)}`
      ]);
    }
    return { kind: 'basic', username: input.username, token: input.token };
  }

  if (input.username || input.token) {
    throw new ConfigError('Incomplete HTTPS credentials', [
      input.username ? 'GIT_TOKEN is missing' : 'GIT_USERNAME is missing'
    ]);
  }

  return { kind: 'anonymous' };
}

/**
 * Remote URL handed to git, with basic credentials embedded
 */
export function authenticatedUrl(repository: string, credentials: GitCredentials): string {
  if (credentials.kind !== 'basic') {
    return repository;
  }

  const url = new URL(repository);
  url.username = credentials.username;
  url.password = credentials.token;
  return url.toString();
}

/**
 * Extra environment for every git process
 */
export function credentialEnvironment(credentials: GitCredentials): Record<string, string> {
  return credentials.kind === 'ssh' ? { GIT_SSH_COMMAND: credentials.command } : {};
}

export function describeCredentials(credentials: GitCredentials): string {
  switch (credentials.kind) {
    case 'ssh':
      return 'ssh transport';
    case 'basic':
      return `https credentials for ${credentials.username}`;
    case 'anonymous':
      return 'anonymous access';
  }
}
