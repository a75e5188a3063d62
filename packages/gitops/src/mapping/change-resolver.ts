import type { DeploymentTarget } from '@git-rollout/k8s-rollout';
import { ruleMatches, type MappingTable } from './mapping-table.js';

/**
 * Names of every deployment affected by a change set. Every matching rule
 * contributes, and the wildcard contributes whenever anything changed.
 * Sorted, so the result does not depend on the order of the paths.
 */
export function resolveDeployments(changedPaths: Iterable<string>, table: MappingTable): string[] {
  const deployments = new Set<string>();
  let anyChange = false;

  for (const changedPath of changedPaths) {
    anyChange = true;
    for (const rule of table.rules) {
      if (ruleMatches(rule.pattern, changedPath, table.matchMode)) {
        rule.deployments.forEach((name) => deployments.add(name));
      }
    }
  }

  if (anyChange) {
    table.wildcard.forEach((name) => deployments.add(name));
  }

  return [...deployments].sort();
}

export function resolve(
  changedPaths: Iterable<string>,
  table: MappingTable,
  namespace: string
): DeploymentTarget[] {
  return resolveDeployments(changedPaths, table).map((name) => ({ namespace, name }));
}
