/**
 * Last processed commit, kept across restarts so a restarted agent does not
 * treat the current tip as a fresh start and skip the changes in between.
 */

import path from 'node:path';
import fs from 'fs-extra';
import { z } from 'zod';
import { redactUrl } from '@git-rollout/gitops';
import { createLogger } from '@git-rollout/logger';
import { errorMessage } from '@git-rollout/resilience';

const logger = createLogger('revision-store');

export interface RevisionStore {
  /** Resolves null when no usable revision is known */
  load(): Promise<string | null>;
  save(revision: string): Promise<void>;
}

export class MemoryRevisionStore implements RevisionStore {
  constructor(private revision: string | null = null) {}

  async load(): Promise<string | null> {
    return this.revision;
  }

  async save(revision: string): Promise<void> {
    this.revision = revision;
  }
}

const revisionRecord = z.object({
  repository: z.string(),
  branch: z.string(),
  revision: z.string().min(1),
  updatedAt: z.string()
});

export type RevisionRecord = z.infer<typeof revisionRecord>;

export interface RevisionScope {
  repository: string;
  branch: string;
}

/**
 * JSON file store. A record written for another repository or branch is
 * ignored, as is a file that cannot be read or parsed.
 */
export class FileRevisionStore implements RevisionStore {
  private readonly repository: string;
  private readonly branch: string;

  constructor(private readonly filePath: string, scope: RevisionScope, private readonly now: () => Date = () => new Date()) {
    this.repository = redactUrl(scope.repository);
    this.branch = scope.branch;
  }

  async load(): Promise<string | null> {
    let content: unknown;
    try {
      if (!(await fs.pathExists(this.filePath))) {
        return null;
      }
      content = await fs.readJson(this.filePath);
    } catch (error) {
      logger.warn({ filePath: this.filePath, error: errorMessage(error) }, 'Unreadable revision state, starting from an unknown revision');
      return null;
    }

    const record = revisionRecord.safeParse(content);
    if (!record.success) {
      logger.warn({ filePath: this.filePath }, 'Corrupt revision state, starting from an unknown revision');
      return null;
    }

    if (record.data.repository !== this.repository || record.data.branch !== this.branch) {
      logger.info({
        filePath: this.filePath,
        storedRepository: record.data.repository,
        storedBranch: record.data.branch
      }, 'Revision state belongs to another repository or branch, ignoring it');
      return null;
    }

    return record.data.revision;
  }

  async save(revision: string): Promise<void> {
    const record: RevisionRecord = {
      repository: this.repository,
      branch: this.branch,
      revision,
      updatedAt: this.now().toISOString()
    };

    // Written beside the target, then renamed over it
    const tempPath = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.tmp`);
    await fs.outputJson(tempPath, record, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
  }
}
