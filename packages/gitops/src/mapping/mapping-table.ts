/**
 * Rollout mapping: which deployments restart when a repository path changes.
 *
 * File format (YAML):
 *
 *   header: [header]
 *   cas: [header, cas]
 *   "*": [geoserver]
 */

import fs from 'fs-extra';
import yaml from 'yaml';
import { z } from 'zod';
import type { MatchMode } from '@git-rollout/config';
import { createLogger } from '@git-rollout/logger';
import { errorMessage } from '@git-rollout/resilience';
import { MappingError } from '../errors.js';

const logger = createLogger('mapping-table');

export const WILDCARD = '*';

export type { MatchMode };

export interface MappingRule {
  pattern: string;
  deployments: string[];
}

export interface MappingTable {
  /** Path-specific rules in file order */
  rules: MappingRule[];
  /** Deployments restarted for every non-empty change set */
  wildcard: string[];
  matchMode: MatchMode;
  source: string;
}

export interface MappingLoadOptions {
  filePath: string;
  matchMode?: MatchMode;
  /** Comma-list deployments appended to the wildcard rule */
  legacyDeployments?: string[];
}

// RFC 1123 subdomain, the naming rule for Deployment objects
const deploymentName = z.string()
  .trim()
  .max(253)
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/, 'not a valid deployment name');

const ruleValue = z.union([
  z.string().transform((name): unknown[] => [name]),
  z.array(z.unknown())
]);

const document = z.record(z.string(), z.unknown());

export function normalizePattern(key: string): string {
  return key
    .trim()
    .replace(/^(\.\/)+/, '')
    .replace(/\/{2,}/g, '/')
    .replace(/^\/+|\/+$/g, '');
}

export function ruleMatches(pattern: string, changedPath: string, mode: MatchMode): boolean {
  if (changedPath === pattern) {
    return true;
  }

  const pathSegments = changedPath.split('/');
  if (mode === 'segment') {
    return pathSegments[0] === pattern;
  }

  const patternSegments = pattern.split('/');
  return patternSegments.length <= pathSegments.length &&
    patternSegments.every((segment, index) => pathSegments[index] === segment);
}

function unique(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

function validDeployments(pattern: string, names: unknown[], source: string): string[] {
  const valid: string[] = [];
  for (const name of names) {
    const parsed = deploymentName.safeParse(name);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      logger.warn({ source, pattern, deployment: name }, 'Skipping invalid deployment name');
    }
  }
  return unique(valid);
}

/**
 * Build a table from YAML text. Rules that cannot be used are skipped with a
 * warning; a document that yields no rule at all is a MappingError.
 */
export function parseMappingTable(
  content: string,
  options: { source: string; matchMode?: MatchMode; legacyDeployments?: string[] }
): MappingTable {
  const { source } = options;
  const matchMode = options.matchMode ?? 'segment';

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new MappingError(source, errorMessage(error), error);
  }

  const entries = parsed === null || parsed === undefined ? {} : parsed;
  const table = document.safeParse(entries);
  if (!table.success || Array.isArray(entries)) {
    throw new MappingError(source, 'expected a mapping of path patterns to deployment lists');
  }

  const rules: MappingRule[] = [];
  const byPattern = new Map<string, MappingRule>();
  let wildcard: string[] = [];

  for (const [key, value] of Object.entries(table.data)) {
    const pattern = key.trim() === WILDCARD ? WILDCARD : normalizePattern(key);
    if (!pattern) {
      logger.warn({ source, key }, 'Skipping mapping rule with an empty path pattern');
      continue;
    }

    const names = ruleValue.safeParse(value);
    if (!names.success) {
      logger.warn({ source, pattern }, 'Skipping mapping rule: value must be a deployment name or a list of names');
      continue;
    }

    const deployments = validDeployments(pattern, names.data, source);
    if (deployments.length === 0) {
      logger.warn({ source, pattern }, 'Skipping mapping rule without valid deployments');
      continue;
    }

    if (pattern === WILDCARD) {
      wildcard = unique([...wildcard, ...deployments]);
      continue;
    }

    const existing = byPattern.get(pattern);
    if (existing) {
      logger.warn({ source, pattern, key }, 'Merging mapping rules that normalise to the same pattern');
      existing.deployments = unique([...existing.deployments, ...deployments]);
      continue;
    }

    if (matchMode === 'segment' && pattern.includes('/')) {
      logger.warn({ source, pattern }, 'Multi-segment pattern only matches its exact path in segment mode; set MAPPING_MATCH_MODE=prefix to match below it');
    }

    const rule: MappingRule = { pattern, deployments };
    byPattern.set(pattern, rule);
    rules.push(rule);
  }

  const legacy = validDeployments(WILDCARD, options.legacyDeployments ?? [], 'ROLLOUT_DEPLOYMENTS');
  wildcard = unique([...wildcard, ...legacy]);

  if (rules.length === 0 && wildcard.length === 0) {
    throw new MappingError(source, 'no usable rules');
  }

  return { rules, wildcard, matchMode, source };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse the mapping file. A missing file is accepted only when
 * legacy deployments are configured, which then form the whole table.
 */
export async function loadMappingTable(options: MappingLoadOptions): Promise<MappingTable> {
  let content: string;
  try {
    content = await fs.readFile(options.filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error) && (options.legacyDeployments?.length ?? 0) > 0) {
      logger.info({ filePath: options.filePath }, 'No mapping file, restarting ROLLOUT_DEPLOYMENTS on every change');
      return parseMappingTable('', {
        source: 'ROLLOUT_DEPLOYMENTS',
        matchMode: options.matchMode,
        legacyDeployments: options.legacyDeployments
      });
    }
    throw new MappingError(options.filePath, `cannot read file: ${errorMessage(error)}`, error);
  }

  return parseMappingTable(content, {
    source: options.filePath,
    matchMode: options.matchMode,
    legacyDeployments: options.legacyDeployments
  });
}

interface FileStamp {
  mtimeMs: number;
  size: number;
}

/**
 * Cached mapping table that re-reads its file when it changes on disk
 */
export class MappingTableSource {
  private table: MappingTable;
  private stamp: FileStamp | null;

  private constructor(private readonly options: MappingLoadOptions, table: MappingTable, stamp: FileStamp | null) {
    this.table = table;
    this.stamp = stamp;
  }

  /**
   * Initial load; any MappingError here is fatal for the caller
   */
  static async load(options: MappingLoadOptions): Promise<MappingTableSource> {
    const stamp = await MappingTableSource.readStamp(options.filePath);
    const table = await loadMappingTable(options);
    logger.info({
      source: table.source,
      rules: table.rules.length,
      wildcard: table.wildcard,
      matchMode: table.matchMode
    }, 'Rollout mapping loaded');
    return new MappingTableSource(options, table, stamp);
  }

  current(): MappingTable {
    return this.table;
  }

  /**
   * Reload when the file's mtime or size moved. A broken file keeps the
   * previous table in place. Resolves true when a new table was installed.
   */
  async refresh(): Promise<boolean> {
    const stamp = await MappingTableSource.readStamp(this.options.filePath);
    if (stamp?.mtimeMs === this.stamp?.mtimeMs && stamp?.size === this.stamp?.size) {
      return false;
    }

    try {
      this.table = await loadMappingTable(this.options);
      this.stamp = stamp;
      logger.info({ source: this.table.source, rules: this.table.rules.length }, 'Rollout mapping reloaded');
      return true;
    } catch (error) {
      logger.warn({ error: errorMessage(error), filePath: this.options.filePath }, 'Mapping reload failed, keeping previous rules');
      return false;
    }
  }

  private static async readStamp(filePath: string): Promise<FileStamp | null> {
    try {
      const stats = await fs.stat(filePath);
      return { mtimeMs: stats.mtimeMs, size: stats.size };
    } catch {
      return null;
    }
  }
}
