/**
 * Repository Mirror
 * Owns the local clone of the monitored branch and reports which paths
 * changed between the last processed revision and the remote tip.
 */

import fs from 'fs-extra';
import * as path from 'path';
import { createLogger } from '@git-rollout/logger';
import { GitError } from '../errors.js';
import {
  authenticatedUrl,
  credentialEnvironment,
  describeCredentials,
  redactUrl,
  type GitCredentials
} from './credentials.js';
import { runGit, type GitCommandResult, type GitRunner } from './git-command.js';

const logger = createLogger('repository-mirror');

/**
 * Repository Mirror Configuration
 */
export interface RepositoryMirrorConfig {
  url: string;
  branch: string;
  localPath: string;
  credentials: GitCredentials;
  /** Upper bound for every single git command */
  timeoutMs: number;
}

/**
 * Outcome of one sync against the remote
 */
export interface SyncResult {
  previousRevision: string | null;
  newRevision: string;
  /** Repository-relative paths that differ between the two revisions */
  changedPaths: string[];
  /** No previous revision was known; nothing was diffed */
  initial: boolean;
  /** The remote tip moved since the previous revision */
  changed: boolean;
}

function splitNul(output: string): string[] {
  const seen = new Set<string>();
  for (const entry of output.split('\0')) {
    const trimmed = entry.replace(/^\n+|\n+$/g, '');
    if (trimmed) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

export class RepositoryMirror {
  private readonly config: RepositoryMirrorConfig;
  private readonly runner: GitRunner;
  private readonly env: Record<string, string>;
  private remoteConfigured = false;

  constructor(config: RepositoryMirrorConfig, runner: GitRunner = runGit) {
    this.config = config;
    this.runner = runner;
    this.env = credentialEnvironment(config.credentials);

    logger.info({
      url: redactUrl(config.url),
      branch: config.branch,
      localPath: config.localPath,
      auth: describeCredentials(config.credentials)
    }, 'Repository mirror initialized');
  }

  get localPath(): string {
    return this.config.localPath;
  }

  /**
   * Fetch the branch tip and diff it against `previousRevision`.
   *
   * The working tree is moved to the new tip only after the diff succeeded,
   * and nothing here touches the caller's revision: on any failure the
   * caller still holds the last good one.
   */
  async sync(previousRevision: string | null, signal?: AbortSignal): Promise<SyncResult> {
    await this.ensureClone(signal);
    await this.fetch(signal);

    const newRevision = await this.remoteTip(signal);

    if (previousRevision === null) {
      await this.checkout(newRevision, signal);
      logger.info({ revision: newRevision }, 'Initial revision recorded, nothing to diff');
      return { previousRevision, newRevision, changedPaths: [], initial: true, changed: false };
    }

    if (newRevision === previousRevision) {
      logger.debug({ revision: newRevision }, 'Remote tip unchanged');
      return { previousRevision, newRevision, changedPaths: [], initial: false, changed: false };
    }

    const changedPaths = await this.changedPathsBetween(previousRevision, newRevision, signal);
    await this.checkout(newRevision, signal);

    logger.info({
      from: previousRevision,
      to: newRevision,
      changedPaths: changedPaths.length
    }, 'New revision fetched');

    return { previousRevision, newRevision, changedPaths, initial: false, changed: true };
  }

  /**
   * Clone on first use; afterwards make sure origin carries the current URL
   */
  private async ensureClone(signal?: AbortSignal): Promise<void> {
    const remoteUrl = authenticatedUrl(this.config.url, this.config.credentials);
    const gitDir = path.join(this.config.localPath, '.git');

    if (await fs.pathExists(gitDir)) {
      if (!this.remoteConfigured) {
        await this.git('remote', ['remote', 'set-url', 'origin', remoteUrl], signal);
        this.remoteConfigured = true;
      }
      return;
    }

    logger.info({ localPath: this.config.localPath }, 'Cloning repository');
    // Leftovers of an interrupted clone would make git refuse the directory
    await fs.emptyDir(this.config.localPath);
    await this.git('clone', [
      'clone',
      '--branch', this.config.branch,
      '--single-branch',
      '--no-tags',
      '--',
      remoteUrl,
      this.config.localPath
    ], signal, path.dirname(this.config.localPath));
    this.remoteConfigured = true;
  }

  private async fetch(signal?: AbortSignal): Promise<void> {
    const branch = this.config.branch;
    await this.git('fetch', [
      'fetch',
      '--prune',
      '--no-tags',
      'origin',
      `+refs/heads/${branch}:refs/remotes/origin/${branch}`
    ], signal);
  }

  private async remoteTip(signal?: AbortSignal): Promise<string> {
    const { stdout } = await this.git('rev-parse', [
      'rev-parse',
      '--verify',
      `refs/remotes/origin/${this.config.branch}^{commit}`
    ], signal);
    const revision = stdout.trim();
    if (!revision) {
      throw new GitError('rev-parse', `branch ${this.config.branch} has no commits`);
    }
    return revision;
  }

  private async hasCommit(revision: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.git('cat-file', ['cat-file', '-e', `${revision}^{commit}`], signal);
      return true;
    } catch (error) {
      if (error instanceof GitError && !error.aborted && error.code === 'GIT_COMMAND_FAILED') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Tree comparison between two commits. When the old commit is gone
   * (history rewritten upstream) every path of the new tree counts as changed.
   */
  private async changedPathsBetween(from: string, to: string, signal?: AbortSignal): Promise<string[]> {
    if (!(await this.hasCommit(from, signal))) {
      logger.warn({ from, to }, 'Previous revision not found in repository, treating every path as changed');
      const { stdout } = await this.git('ls-tree', ['ls-tree', '-r', '--name-only', '-z', to], signal);
      return splitNul(stdout);
    }

    const { stdout } = await this.git('diff', [
      'diff',
      '--name-only',
      '--no-renames',
      '-z',
      from,
      to,
      '--'
    ], signal);
    return splitNul(stdout);
  }

  private async checkout(revision: string, signal?: AbortSignal): Promise<void> {
    await this.git('checkout', ['checkout', '--force', '-B', this.config.branch, revision], signal);
  }

  private async git(
    operation: string,
    args: string[],
    signal?: AbortSignal,
    cwd: string = this.config.localPath
  ): Promise<GitCommandResult> {
    if (signal?.aborted) {
      throw new GitError(operation, 'aborted', { code: 'GIT_ABORTED', aborted: true });
    }
    return this.runner(args, {
      cwd,
      env: this.env,
      timeoutMs: this.config.timeoutMs,
      signal
    });
  }
}
