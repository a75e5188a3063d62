/**
 * Deployment to restart
 */
export interface DeploymentTarget {
  namespace: string;
  name: string;
}

export interface RolloutResult {
  target: DeploymentTarget;
  /** Value written to the restart annotation */
  restartedAt: string;
}

/**
 * The part of the apps/v1 API the agent needs. AppsV1Api satisfies it;
 * tests hand in a fake.
 */
export interface DeploymentsApi {
  patchNamespacedDeployment(
    name: string,
    namespace: string,
    body: object,
    pretty?: string,
    dryRun?: string,
    fieldManager?: string,
    fieldValidation?: string,
    force?: boolean,
    options?: { headers: { [name: string]: string } }
  ): Promise<unknown>;
}

export function targetKey(target: DeploymentTarget): string {
  return `${target.namespace}/${target.name}`;
}
