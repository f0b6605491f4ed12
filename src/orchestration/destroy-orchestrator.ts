import chalk from 'chalk';
import { resourceGroupFromResourceId, resourceGroupPortalUrl, type DeploymentNamingService } from '../config/naming.js';
import { EnvironmentKeys } from '../config/types.js';
import type { Console } from '../console/types.js';
import {
  describeError,
  OperationCancelledError,
  ResourceNotFoundError,
  ResourceOperationError,
  UserDeniedError
} from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { DeploymentLookup } from '../provisioning/deployment-lookup.js';
import {
  createDeploymentTarget,
  type DeploymentTargetOptions,
  emptyTemplateFor
} from '../provisioning/deployment-target.js';
import { untilAborted } from '../provisioning/retry.js';
import {
  type ControlPlane,
  type DeploymentScope,
  type ResourceRecord,
  type SoftDeleteState,
  TagKeys,
  toPurgeableResourceType
} from '../provisioning/types.js';
import type { TemplateCompiler } from '../templates/types.js';
import { type DeploymentRecord, ProvisioningState, type PurgeCandidate } from '../types/index.js';
import { createOutputParameters, deploymentScopeFor, templatePath } from './infra-context.js';
import type { DestroyOptions, DestroyResult, OrchestrationContext, PurgeOutcome } from './types.js';

const RESOURCE_GROUP_TYPE = 'Microsoft.Resources/resourceGroups';

const PURGE_LABELS: Record<PurgeCandidate['resourceType'], string> = {
  'Microsoft.KeyVault/vaults': 'Key Vaults',
  'Microsoft.KeyVault/managedHSMs': 'Managed HSMs',
  'Microsoft.AppConfiguration/configurationStores': 'App Configurations',
  'Microsoft.ApiManagement/service': 'API Management services',
  'Microsoft.CognitiveServices/accounts': 'Cognitive Services accounts'
};

export interface DestroyDependencies {
  compiler: TemplateCompiler;
  lookup: DeploymentLookup;
  controlPlane: ControlPlane;
  naming: DeploymentNamingService;
  console: Console;
  logger: Logger;
  target?: DeploymentTargetOptions;
}

/**
 * Resource groups a deployment created. A successful deployment lists its resources as
 * outputs; a failed one does not, so its dependency graph is read instead. A
 * resource-group deployment only ever touches its own group.
 */
export function resourceGroupsOf(deployment: DeploymentRecord, scope: DeploymentScope): string[] {
  if (scope.kind === 'resourceGroup') {
    return [scope.resourceGroup];
  }

  const groups = new Set<string>();
  if (deployment.provisioningState === ProvisioningState.Succeeded) {
    for (const id of deployment.outputResourceIds) {
      const group = resourceGroupFromResourceId(id);
      if (group) {
        groups.add(group);
      }
    }
  } else {
    for (const dependency of deployment.dependencies) {
      for (const reference of dependency.dependsOn) {
        if (reference.resourceType === RESOURCE_GROUP_TYPE && reference.resourceName) {
          groups.add(reference.resourceName);
        }
      }
    }
  }
  return [...groups];
}

/**
 * Tears an environment down: deletes the resource groups of its latest deployment,
 * purges soft-deleted resources, and records an empty deployment so the history stays.
 */
export class DestroyOrchestrator {
  constructor(
    private readonly deps: DestroyDependencies,
    private readonly context: OrchestrationContext
  ) {}

  async destroy(options: DestroyOptions = {}): Promise<DestroyResult> {
    const environmentName = this.context.environment.name;
    const template = await this.deps.compiler.compile(templatePath(this.context));
    const scope = deploymentScopeFor(template.targetScope, this.context, false);
    const target = createDeploymentTarget(this.deps.controlPlane, scope, environmentName, this.targetOptions());

    // Step 1: Locate the deployment to tear down
    const deployment = await this.deps.lookup.find(target, environmentName);

    // Step 2: Enumerate the resources of every group that still exists
    const groupResources = await this.listGroupResources(scope, resourceGroupsOf(deployment, scope));

    // Step 3: Find soft-deleted resources that may be purged once their group is gone
    const candidates = await this.findPurgeCandidates(scope.subscriptionId, groupResources);

    // Step 4: Delete the resource groups
    const deletedResourceGroups = await this.deleteResourceGroups(scope.subscriptionId, groupResources, options);

    // Step 5: Purge
    const purges = await this.purgeResources(scope.subscriptionId, candidates, options);

    // Step 6: Keep the deployment history queryable
    await this.deployEmptyTemplate(scope, deployment, options);

    // Step 7: Drop environment values that described the removed infrastructure
    const invalidatedEnvKeys = Object.keys(createOutputParameters(template.outputs, deployment.outputs));
    if (scope.kind === 'resourceGroup' && groupResources.has(scope.resourceGroup)) {
      invalidatedEnvKeys.push(EnvironmentKeys.ResourceGroup);
    }
    await this.clearEnvironment(invalidatedEnvKeys);

    return { deployment, deletedResourceGroups, purges, invalidatedEnvKeys };
  }

  private async listGroupResources(
    scope: DeploymentScope,
    groups: string[]
  ): Promise<Map<string, ResourceRecord[]>> {
    const result = new Map<string, ResourceRecord[]>();
    for (const group of groups) {
      try {
        result.set(group, await this.deps.controlPlane.listResourceGroupResources(scope.subscriptionId, group));
      } catch (error) {
        if (error instanceof ResourceNotFoundError) {
          this.deps.logger.info(`Resource group ${group} was already deleted, skipping`);
          continue;
        }
        throw error;
      }
    }
    return result;
  }

  private async findPurgeCandidates(
    subscriptionId: string,
    groupResources: Map<string, ResourceRecord[]>
  ): Promise<PurgeCandidate[]> {
    const candidates: PurgeCandidate[] = [];
    for (const [group, resources] of groupResources) {
      for (const resource of resources) {
        const resourceType = toPurgeableResourceType(resource.type);
        if (!resourceType) {
          continue;
        }

        let state: SoftDeleteState;
        try {
          state = await this.deps.controlPlane.getSoftDeleteState(subscriptionId, resourceType, group, resource.name);
        } catch (error) {
          if (error instanceof ResourceNotFoundError) {
            this.deps.logger.debug(`${resourceType} ${resource.name} no longer exists, not purging it`);
            continue;
          }
          throw new ResourceOperationError('Inspect', resourceType, resource.name, error);
        }

        if (state.softDeleteEnabled && !state.purgeProtectionEnabled) {
          candidates.push({
            resourceType,
            name: resource.name,
            resourceGroup: group,
            location: state.location || resource.location,
            kind: state.kind ?? resource.kind,
            softDeleteEnabled: state.softDeleteEnabled,
            purgeProtectionEnabled: state.purgeProtectionEnabled
          });
        }
      }
    }
    return candidates;
  }

  private async deleteResourceGroups(
    subscriptionId: string,
    groupResources: Map<string, ResourceRecord[]>,
    options: DestroyOptions
  ): Promise<string[]> {
    const groups = [...groupResources.keys()];
    if (groups.length === 0) {
      this.deps.console.message('No resource groups to delete.');
      return [];
    }

    if (!options.force) {
      const total = [...groupResources.values()].reduce((count, resources) => count + resources.length, 0);
      const lines = groups.map(group => `  ${group}: ${chalk.cyan(resourceGroupPortalUrl(subscriptionId, group))}`);
      this.deps.console.message(`Resource groups to delete:\n${lines.join('\n')}`);

      const confirmed = await this.deps.console.confirm({
        message: `Total resources to delete: ${total}, are you sure you want to continue?`,
        defaultValue: false
      });
      if (!confirmed) {
        throw new UserDeniedError('Deletion of the resource groups was denied');
      }
    }

    for (const group of groups) {
      this.deps.console.showSpinner(`Deleting resource group ${group}`);
      try {
        await untilAborted(
          signal => this.deps.controlPlane.deleteResourceGroup(subscriptionId, group, { signal }),
          options.signal,
          `Deletion of resource group ${group} was cancelled`
        );
      } catch (error) {
        this.deps.console.stopSpinner(`Deleting resource group ${group}`, 'failure');
        throw error instanceof OperationCancelledError
          ? error
          : new ResourceOperationError('Delete', 'resource group', group, error);
      }
      this.deps.console.stopSpinner(`Deleted resource group ${group}`, 'success');
    }
    return groups;
  }

  private async purgeResources(
    subscriptionId: string,
    candidates: PurgeCandidate[],
    options: DestroyOptions
  ): Promise<PurgeOutcome[]> {
    if (candidates.length === 0) {
      return [];
    }

    if (!options.purge) {
      const counts = new Map<string, number>();
      for (const candidate of candidates) {
        const label = PURGE_LABELS[candidate.resourceType];
        counts.set(label, (counts.get(label) ?? 0) + 1);
      }
      const summary = [...counts].map(([label, count]) => `  ${count} ${label}`).join('\n');
      this.deps.console.message(
        chalk.yellow(
          `These resources have soft delete enabled, so their names stay reserved until they are purged:\n${summary}`
        )
      );

      const confirmed = await this.deps.console.confirm({
        message: 'Would you like to permanently delete these resources instead, allowing their names to be reused?',
        defaultValue: false
      });
      if (!confirmed) {
        this.deps.console.message('Skipped purging soft-deleted resources.');
        return candidates.map(candidate => ({ candidate, status: 'skipped' }));
      }
    }

    const outcomes: PurgeOutcome[] = [];
    for (const batch of groupForPurge(candidates).values()) {
      for (const candidate of batch) {
        this.deps.console.showSpinner(`Purging ${candidate.resourceType} ${candidate.name}`);
        try {
          await untilAborted(
            signal => this.deps.controlPlane.purge(subscriptionId, candidate, { signal }),
            options.signal,
            `Purge of ${candidate.name} was cancelled`
          );
        } catch (error) {
          this.deps.console.stopSpinner(`Purging ${candidate.name}`, 'failure');
          throw error instanceof OperationCancelledError
            ? error
            : new ResourceOperationError('Purge', candidate.resourceType, candidate.name, error);
        }
        this.deps.console.stopSpinner(`Purged ${candidate.resourceType} ${candidate.name}`, 'success');
        outcomes.push({ candidate, status: 'purged' });
      }
    }
    return outcomes;
  }

  /** Best effort: the resources are gone whether or not this succeeds */
  private async deployEmptyTemplate(
    scope: DeploymentScope,
    deployment: DeploymentRecord,
    options: DestroyOptions
  ): Promise<void> {
    const historyScope: DeploymentScope =
      scope.kind === 'subscription' && !scope.location ? { ...scope, location: deployment.location ?? '' } : scope;
    if (historyScope.kind === 'subscription' && !historyScope.location) {
      this.deps.logger.warn('No location is known for the teardown deployment, the history marker was not written');
      return;
    }

    const environmentName = this.context.environment.name;
    const target = createDeploymentTarget(
      this.deps.controlPlane,
      historyScope,
      this.deps.naming.generateDeploymentName(environmentName),
      this.targetOptions()
    );
    try {
      await target.deploy(
        JSON.stringify(emptyTemplateFor(historyScope)),
        {},
        { [TagKeys.EnvironmentName]: environmentName, [TagKeys.DeployReason]: 'down' },
        { signal: options.signal }
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      this.deps.logger.warn(`Failed to record the teardown deployment: ${describeError(error)}`);
    }
  }

  private async clearEnvironment(keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    const environment = this.context.environment;
    for (const key of keys) {
      environment.unset(key);
    }
    try {
      await environment.save();
    } catch (error) {
      this.deps.logger.warn(`Failed to save the environment: ${describeError(error)}`);
    }
  }

  private targetOptions(): DeploymentTargetOptions {
    return { logger: this.deps.logger, ...this.deps.target };
  }
}

/** Purges run per resource type; Cognitive Services accounts also per kind */
function groupForPurge(candidates: PurgeCandidate[]): Map<string, PurgeCandidate[]> {
  const batches = new Map<string, PurgeCandidate[]>();
  for (const candidate of candidates) {
    const key =
      candidate.resourceType === 'Microsoft.CognitiveServices/accounts'
        ? `${candidate.resourceType}/${candidate.kind ?? ''}`
        : candidate.resourceType;
    const batch = batches.get(key) ?? [];
    batch.push(candidate);
    batches.set(key, batch);
  }
  return batches;
}

export function createDestroyOrchestrator(
  deps: DestroyDependencies,
  context: OrchestrationContext
): DestroyOrchestrator {
  return new DestroyOrchestrator(deps, context);
}
