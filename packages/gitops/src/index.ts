export { GitError, MappingError } from './errors.js';

export {
  resolveCredentials,
  authenticatedUrl,
  credentialEnvironment,
  describeCredentials,
  redactUrl
} from './git/credentials.js';
export type { GitCredentials, CredentialInput } from './git/credentials.js';

export { runGit } from './git/git-command.js';
export type { GitRunner, GitCommandOptions, GitCommandResult } from './git/git-command.js';

export { RepositoryMirror } from './git/repository-mirror.js';
export type { RepositoryMirrorConfig, SyncResult } from './git/repository-mirror.js';

export {
  WILDCARD,
  MappingTableSource,
  loadMappingTable,
  parseMappingTable,
  normalizePattern,
  ruleMatches
} from './mapping/mapping-table.js';
export type { MappingRule, MappingTable, MappingLoadOptions, MatchMode } from './mapping/mapping-table.js';

export { resolve, resolveDeployments } from './mapping/change-resolver.js';
