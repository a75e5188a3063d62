import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { GitError } from '../errors.js';
import { redactUrl } from './credentials.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 64 * 1024 * 1024;

export interface GitCommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface GitCommandResult {
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[], options?: GitCommandOptions) => Promise<GitCommandResult>;

function stringField(error: unknown, field: 'stderr' | 'code' | 'name'): string | undefined {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

function wasKilled(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;
}

/**
 * Run one git command. Prompts are disabled so a missing credential fails
 * instead of hanging; failures surface as GitError with credentials redacted.
 */
export const runGit: GitRunner = async (args, options = {}) => {
  const command = redactUrl(`git ${args.join(' ')}`);
  const operation = args[0] ?? 'command';

  try {
    const { stdout, stderr } = await execFileAsync('git', args, {
      cwd: options.cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...options.env },
      timeout: options.timeoutMs,
      signal: options.signal,
      maxBuffer: MAX_BUFFER,
      encoding: 'utf8'
    });
    return { stdout, stderr };
  } catch (error) {
    const stderr = redactUrl(stringField(error, 'stderr')?.trim() ?? '');

    if (options.signal?.aborted || stringField(error, 'name') === 'AbortError') {
      throw new GitError(operation, 'aborted', {
        code: 'GIT_ABORTED',
        aborted: true,
        details: { command },
        cause: error
      });
    }

    if (wasKilled(error)) {
      throw new GitError(operation, `timed out after ${options.timeoutMs}ms`, {
        code: 'GIT_TIMEOUT',
        details: { command, timeoutMs: options.timeoutMs },
        cause: error
      });
    }

    const reason = stderr || redactUrl(error instanceof Error ? error.message : String(error));
    throw new GitError(operation, reason, {
      details: { command, stderr },
      cause: error
    });
  }
};
