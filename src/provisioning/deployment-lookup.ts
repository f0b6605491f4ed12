import type { Console } from '../console/types.js';
import { NoDeploymentsFoundError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { type DeploymentRecord, ProvisioningState } from '../types/index.js';
import type { DeploymentTarget } from './deployment-target.js';
import { TagKeys } from './types.js';

export function isTerminalState(state: string): boolean {
  return state === ProvisioningState.Succeeded || state === ProvisioningState.Failed;
}

export function newestFirst(deployments: readonly DeploymentRecord[]): DeploymentRecord[] {
  return [...deployments].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}

/**
 * Deployments that may belong to the environment, newest first:
 *
 * 1. the newest deployment tagged with the environment name, alone;
 * 2. otherwise the deployment named exactly like the environment, alone;
 * 3. otherwise every finished deployment whose name contains `hint`.
 */
export function matchEnvironmentDeployments(
  deployments: readonly DeploymentRecord[],
  environmentName: string,
  hint: string = environmentName
): DeploymentRecord[] {
  const sorted = newestFirst(deployments);

  const tagged = sorted.find(deployment => deployment.tags[TagKeys.EnvironmentName] === environmentName);
  if (tagged) {
    return [tagged];
  }

  const named = sorted.find(deployment => deployment.name === environmentName);
  if (named) {
    return [named];
  }

  return sorted.filter(deployment => isTerminalState(deployment.provisioningState) && deployment.name.includes(hint));
}

export interface LookupOptions {
  /** Substring matched against deployment names, by default the environment name */
  hint?: string;
  /** Ignore deployments that are still running or were canceled */
  terminalOnly?: boolean;
}

export class DeploymentLookup {
  constructor(
    private readonly console: Console,
    private readonly logger?: Logger
  ) {}

  /**
   * Finds the deployment of `environmentName` in the target's scope. Several candidates
   * are settled by asking the user.
   *
   * @throws NoDeploymentsFoundError when nothing matches
   */
  async find(
    target: DeploymentTarget,
    environmentName: string,
    options: LookupOptions = {}
  ): Promise<DeploymentRecord> {
    const listed = await target.listDeployments();
    const deployments = options.terminalOnly
      ? listed.filter(deployment => isTerminalState(deployment.provisioningState))
      : listed;
    const matches = matchEnvironmentDeployments(deployments, environmentName, options.hint);
    this.logger?.debug(
      `${matches.length} of ${deployments.length} deployments match environment ${environmentName}`
    );

    if (matches.length === 0) {
      throw new NoDeploymentsFoundError(environmentName);
    }
    if (matches.length === 1) {
      return matches[0];
    }

    const index = await this.console.select({
      message: `Several deployments match the environment '${environmentName}'. Select the one to use:`,
      options: matches.map(formatOption),
      defaultValue: formatOption(matches[0])
    });
    return matches[index];
  }
}

function formatOption(deployment: DeploymentRecord): string {
  return `${deployment.name} (${deployment.timestamp.toISOString()})`;
}
