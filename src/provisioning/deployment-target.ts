import { deploymentPortalUrl, resourceGroupPortalUrl } from '../config/naming.js';
import { DeploymentFailedError, DeploymentTimeoutError, isProvisionError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { EMPTY_RESOURCE_GROUP_TEMPLATE, EMPTY_SUBSCRIPTION_TEMPLATE, type ArmTemplate } from '../templates/types.js';
import type { DeploymentRecord, JsonValue, ProposedChange } from '../types/index.js';
import { type RetryOptions, retryWhileNotFound, untilAborted } from './retry.js';
import type { ControlPlane, DeploymentOperation, DeploymentScope } from './types.js';

export interface DeployOptions {
  signal?: AbortSignal;
}

/**
 * One named deployment in one scope. The subscription and resource-group variants share
 * this surface; only the scope value they carry differs.
 */
export interface DeploymentTarget {
  readonly scope: DeploymentScope;
  readonly deploymentName: string;

  /**
   * Issues the deployment, then reads it back. A just-finished deployment may not be
   * visible yet, so "not found" on the read is retried with backoff.
   */
  deploy(
    template: string,
    parameters: Record<string, JsonValue>,
    tags: Record<string, string>,
    options?: DeployOptions
  ): Promise<DeploymentRecord>;
  getDeployment(): Promise<DeploymentRecord>;
  listDeployments(): Promise<DeploymentRecord[]>;
  listOperations(): Promise<DeploymentOperation[]>;
  /** Changes the deployment would make, with no side effects */
  deployPreview(template: string, parameters: Record<string, JsonValue>): Promise<ProposedChange[]>;
  /** Same target with another deployment name in the same scope */
  withDeploymentName(deploymentName: string): DeploymentTarget;
}

export interface DeploymentTargetOptions {
  retry?: Omit<RetryOptions, 'signal' | 'logger'>;
  logger?: Logger;
}

export function createDeploymentTarget(
  controlPlane: ControlPlane,
  scope: DeploymentScope,
  deploymentName: string,
  options: DeploymentTargetOptions = {}
): DeploymentTarget {
  const getDeployment = (): Promise<DeploymentRecord> => controlPlane.getDeployment(scope, deploymentName);

  return {
    scope,
    deploymentName,

    async deploy(template, parameters, tags, deployOptions = {}) {
      options.logger?.debug(`Deploying ${deploymentName} to ${describeScope(scope)}`);
      try {
        await untilAborted(
          signal => controlPlane.deploy(scope, { name: deploymentName, template, parameters, tags }, { signal }),
          deployOptions.signal,
          `Deployment ${deploymentName} was cancelled`
        );
      } catch (error) {
        throw isProvisionError(error) ? error : new DeploymentFailedError(deploymentName, error);
      }

      const { value, attempts } = await retryWhileNotFound(
        getDeployment,
        (attemptCount, lastError) => new DeploymentTimeoutError(deploymentName, attemptCount, lastError),
        { ...options.retry, signal: deployOptions.signal, logger: options.logger }
      );
      if (attempts > 1) {
        options.logger?.debug(`Deployment ${deploymentName} became visible after ${attempts} attempts`);
      }
      return value;
    },

    getDeployment,

    listDeployments: () => controlPlane.listDeployments(scope),

    listOperations: () => controlPlane.listDeploymentOperations(scope, deploymentName),

    deployPreview: (template, parameters) =>
      controlPlane.deployPreview(scope, { name: deploymentName, template, parameters, tags: {} }),

    withDeploymentName: name => createDeploymentTarget(controlPlane, scope, name, options)
  };
}

export function describeScope(scope: DeploymentScope): string {
  switch (scope.kind) {
    case 'subscription':
      return `subscription ${scope.subscriptionId} (${scope.location})`;
    case 'resourceGroup':
      return `resource group ${scope.resourceGroup}`;
  }
}

/** Template with no resources, deployed to keep the history of a torn-down environment */
export function emptyTemplateFor(scope: DeploymentScope): ArmTemplate {
  switch (scope.kind) {
    case 'subscription':
      return EMPTY_SUBSCRIPTION_TEMPLATE;
    case 'resourceGroup':
      return EMPTY_RESOURCE_GROUP_TEMPLATE;
  }
}

/** Portal page showing the progress of a deployment: its resource group, or the deployment itself */
export function progressPortalUrl(scope: DeploymentScope, deploymentName: string): string {
  switch (scope.kind) {
    case 'subscription':
      return deploymentPortalUrl(
        `/subscriptions/${scope.subscriptionId}/providers/Microsoft.Resources/deployments/${deploymentName}`
      );
    case 'resourceGroup':
      return resourceGroupPortalUrl(scope.subscriptionId, scope.resourceGroup);
  }
}
