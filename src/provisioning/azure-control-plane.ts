/**
 * Azure control plane
 *
 * Deployments, what-if, resource groups and locations via @azure/arm-resources and
 * @azure/arm-resources-subscriptions. Soft-delete inspection and purge are delegated
 * to AzurePurgeServices.
 */

import type { TokenCredential } from '@azure/identity';
import {
  type DeploymentExtended,
  type DeploymentOperation as ArmDeploymentOperation,
  ResourceManagementClient
} from '@azure/arm-resources';
import { SubscriptionClient } from '@azure/arm-resources-subscriptions';
import { ConfigurationError, DeploymentNotFoundError, ResourceNotFoundError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { isJsonObject } from '../parameters/values.js';
import type {
  DeploymentOutput,
  DeploymentRecord,
  JsonObject,
  JsonValue,
  ProposedChange,
  PurgeableResourceType,
  PurgeCandidate,
  ResourceReference
} from '../types/index.js';
import { callAzure } from './azure-errors.js';
import { AzurePurgeServices } from './azure-purge-services.js';
import type {
  ControlPlane,
  DeploymentOperation,
  DeploymentRequest,
  DeploymentScope,
  Location,
  OperationOptions,
  QuotaUsage,
  ResourceRecord,
  SoftDeleteState
} from './types.js';

export class AzureControlPlane implements ControlPlane {
  private readonly resourceClients = new Map<string, ResourceManagementClient>();
  private subscriptionClient?: SubscriptionClient;
  private readonly purgeServices: AzurePurgeServices;

  constructor(
    private readonly credential: TokenCredential,
    private readonly logger?: Logger
  ) {
    this.purgeServices = new AzurePurgeServices(credential);
  }

  async deploy(scope: DeploymentScope, request: DeploymentRequest, options: OperationOptions = {}): Promise<void> {
    const client = this.getResourceClient(scope.subscriptionId);
    const properties = {
      mode: 'Incremental' as const,
      template: parseTemplate(request.template),
      parameters: toArmParameters(request.parameters)
    };
    const sdkOptions = { abortSignal: options.signal };

    await callAzure(
      async () => {
        if (scope.kind === 'subscription') {
          await client.deployments.beginCreateOrUpdateAtSubscriptionScopeAndWait(
            request.name,
            { location: scope.location, properties, tags: request.tags },
            sdkOptions
          );
        } else {
          await client.deployments.beginCreateOrUpdateAndWait(
            scope.resourceGroup,
            request.name,
            { properties, tags: request.tags },
            sdkOptions
          );
        }
      },
      { signal: options.signal, cancelled: `Deployment ${request.name} was cancelled` }
    );
  }

  async getDeployment(scope: DeploymentScope, name: string): Promise<DeploymentRecord> {
    const client = this.getResourceClient(scope.subscriptionId);
    const deployment = await callAzure(
      () =>
        scope.kind === 'subscription'
          ? client.deployments.getAtSubscriptionScope(name)
          : client.deployments.get(scope.resourceGroup, name),
      { notFound: cause => new DeploymentNotFoundError(name, cause) }
    );
    return toDeploymentRecord(deployment);
  }

  async listDeployments(scope: DeploymentScope): Promise<DeploymentRecord[]> {
    const client = this.getResourceClient(scope.subscriptionId);
    const iterator =
      scope.kind === 'subscription'
        ? client.deployments.listAtSubscriptionScope()
        : client.deployments.listByResourceGroup(scope.resourceGroup);

    const results: DeploymentRecord[] = [];
    for await (const deployment of iterator) {
      results.push(toDeploymentRecord(deployment));
    }
    return results;
  }

  async listDeploymentOperations(scope: DeploymentScope, name: string): Promise<DeploymentOperation[]> {
    const client = this.getResourceClient(scope.subscriptionId);
    const iterator =
      scope.kind === 'subscription'
        ? client.deploymentOperations.listAtSubscriptionScope(name)
        : client.deploymentOperations.list(scope.resourceGroup, name);

    const results: DeploymentOperation[] = [];
    await callAzure(
      async () => {
        for await (const operation of iterator) {
          results.push(toDeploymentOperation(operation));
        }
      },
      { notFound: cause => new DeploymentNotFoundError(name, cause) }
    );
    return results;
  }

  async deployPreview(scope: DeploymentScope, request: DeploymentRequest): Promise<ProposedChange[]> {
    const client = this.getResourceClient(scope.subscriptionId);
    const properties = {
      mode: 'Incremental' as const,
      template: parseTemplate(request.template),
      parameters: toArmParameters(request.parameters)
    };

    const result =
      scope.kind === 'subscription'
        ? await client.deployments.beginWhatIfAtSubscriptionScopeAndWait(request.name, {
            location: scope.location,
            properties
          })
        : await client.deployments.beginWhatIfAndWait(scope.resourceGroup, request.name, { properties });

    if (result.error) {
      throw new Error(`Preview failed: ${result.error.message ?? result.error.code ?? 'unknown error'}`);
    }
    return (result.changes ?? []).map(change => ({ resourceId: change.resourceId, changeType: change.changeType }));
  }

  async computeTemplateHash(subscriptionId: string, template: string): Promise<string> {
    const client = this.getResourceClient(subscriptionId);
    const result = await client.deployments.calculateTemplateHash(parseTemplate(template));
    if (!result.templateHash) {
      throw new Error('The control plane returned no template hash');
    }
    return result.templateHash;
  }

  async listResourceGroups(subscriptionId: string): Promise<string[]> {
    const client = this.getResourceClient(subscriptionId);
    const groups: string[] = [];
    for await (const group of client.resourceGroups.list()) {
      if (group.name) {
        groups.push(group.name);
      }
    }
    return groups;
  }

  async listResourceGroupResources(subscriptionId: string, resourceGroup: string): Promise<ResourceRecord[]> {
    const client = this.getResourceClient(subscriptionId);
    const resources: ResourceRecord[] = [];
    await callAzure(
      async () => {
        for await (const resource of client.resources.listByResourceGroup(resourceGroup)) {
          resources.push({
            id: resource.id ?? '',
            name: resource.name ?? '',
            type: resource.type ?? '',
            location: resource.location ?? '',
            kind: resource.kind
          });
        }
      },
      { notFound: cause => new ResourceNotFoundError(`Resource group ${resourceGroup}`, cause) }
    );
    return resources;
  }

  async deleteResourceGroup(
    subscriptionId: string,
    resourceGroup: string,
    options: OperationOptions = {}
  ): Promise<void> {
    this.logger?.debug(`Deleting resource group ${resourceGroup}`);
    const client = this.getResourceClient(subscriptionId);
    await callAzure(() => client.resourceGroups.beginDeleteAndWait(resourceGroup, { abortSignal: options.signal }), {
      signal: options.signal,
      cancelled: `Deletion of resource group ${resourceGroup} was cancelled`
    });
  }

  getSoftDeleteState(
    subscriptionId: string,
    resourceType: PurgeableResourceType,
    resourceGroup: string,
    name: string
  ): Promise<SoftDeleteState> {
    return this.purgeServices.getSoftDeleteState(subscriptionId, resourceType, resourceGroup, name);
  }

  purge(subscriptionId: string, candidate: PurgeCandidate, options: OperationOptions = {}): Promise<void> {
    this.logger?.debug(`Purging ${candidate.resourceType} ${candidate.name}`);
    return this.purgeServices.purge(subscriptionId, candidate, options);
  }

  async listLocations(subscriptionId: string): Promise<Location[]> {
    this.subscriptionClient ??= new SubscriptionClient(this.credential);
    const locations: Location[] = [];
    for await (const location of this.subscriptionClient.subscriptions.listLocations(subscriptionId)) {
      // Logical regions (e.g. geographies) cannot host resources
      if (!location.name || location.metadata?.regionType === 'Logical') {
        continue;
      }
      locations.push({ name: location.name, displayName: location.displayName ?? location.name });
    }
    return locations.sort((a, b) => a.displayName.localeCompare(b.displayName));
  }

  listAiUsages(subscriptionId: string, location: string): Promise<QuotaUsage[]> {
    return this.purgeServices.listAiUsages(subscriptionId, location);
  }

  private getResourceClient(subscriptionId: string): ResourceManagementClient {
    let client = this.resourceClients.get(subscriptionId);
    if (!client) {
      client = new ResourceManagementClient(this.credential, subscriptionId);
      this.resourceClients.set(subscriptionId, client);
    }
    return client;
  }
}

function parseTemplate(template: string): JsonObject {
  const parsed: JsonValue = JSON.parse(template);
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError('The deployment template is not a JSON object');
  }
  return parsed;
}

function toArmParameters(parameters: Record<string, JsonValue>): Record<string, { value: JsonValue }> {
  const result: Record<string, { value: JsonValue }> = {};
  for (const [name, value] of Object.entries(parameters)) {
    result[name] = { value };
  }
  return result;
}

export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toJsonValue(entry);
    }
    return result;
  }
  return String(value);
}

function toOutputs(outputs: unknown): Record<string, DeploymentOutput> {
  const result: Record<string, DeploymentOutput> = {};
  const json = toJsonValue(outputs);
  if (!isJsonObject(json)) {
    return result;
  }
  for (const [name, output] of Object.entries(json)) {
    if (isJsonObject(output)) {
      result[name] = {
        type: typeof output.type === 'string' ? output.type : undefined,
        value: output.value ?? null
      };
    }
  }
  return result;
}

function toReference(reference: { id?: string; resourceType?: string; resourceName?: string }): ResourceReference {
  return { id: reference.id, resourceType: reference.resourceType, resourceName: reference.resourceName };
}

export function toDeploymentRecord(deployment: DeploymentExtended): DeploymentRecord {
  const properties = deployment.properties;
  return {
    id: deployment.id ?? '',
    name: deployment.name ?? '',
    location: deployment.location,
    provisioningState: properties?.provisioningState ?? 'Unknown',
    timestamp: properties?.timestamp ?? new Date(0),
    tags: deployment.tags ?? {},
    outputs: toOutputs(properties?.outputs),
    outputResourceIds: (properties?.outputResources ?? []).flatMap(resource => (resource.id ? [resource.id] : [])),
    dependencies: (properties?.dependencies ?? []).map(dependency => ({
      ...toReference(dependency),
      dependsOn: (dependency.dependsOn ?? []).map(toReference)
    })),
    templateHash: properties?.templateHash
  };
}

function toDeploymentOperation(operation: ArmDeploymentOperation): DeploymentOperation {
  const target = operation.properties?.targetResource;
  return {
    id: operation.operationId ?? operation.id ?? '',
    provisioningState: operation.properties?.provisioningState ?? 'Unknown',
    timestamp: operation.properties?.timestamp,
    resourceId: target?.id,
    resourceType: target?.resourceType,
    resourceName: target?.resourceName
  };
}
