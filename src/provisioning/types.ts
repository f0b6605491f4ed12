import type {
  DeploymentRecord,
  JsonValue,
  ProposedChange,
  PurgeableResourceType,
  PurgeCandidate
} from '../types/index.js';

// Provisioning-specific types

export type DeploymentScope =
  | { kind: 'subscription'; subscriptionId: string; location: string }
  | { kind: 'resourceGroup'; subscriptionId: string; resourceGroup: string };

export interface DeploymentRequest {
  name: string;
  /** Raw template artifact (ARM JSON) */
  template: string;
  parameters: Record<string, JsonValue>;
  tags: Record<string, string>;
}

export interface DeploymentOperation {
  id: string;
  provisioningState: string;
  timestamp?: Date;
  resourceId?: string;
  resourceType?: string;
  resourceName?: string;
}

export interface ResourceRecord {
  id: string;
  name: string;
  type: string;
  location: string;
  kind?: string;
}

export interface Location {
  name: string;
  displayName: string;
}

export interface QuotaUsage {
  name: string;
  limit: number;
  currentValue: number;
}

/**
 * Soft-delete state of one resource, as reported by its resource provider.
 */
export interface SoftDeleteState {
  location: string;
  kind?: string;
  softDeleteEnabled: boolean;
  purgeProtectionEnabled: boolean;
}

/** Long-running calls stop waiting, and raise OperationCancelledError, once `signal` aborts */
export interface OperationOptions {
  signal?: AbortSignal;
}

/**
 * Network boundary to the cloud control plane. Implementations must raise
 * DeploymentNotFoundError for a missing deployment and ResourceNotFoundError for any
 * other missing resource, so callers can tell them from other failures.
 */
export interface ControlPlane {
  /** Resolves once the control plane reports the deployment finished; read the result back with getDeployment */
  deploy(scope: DeploymentScope, request: DeploymentRequest, options?: OperationOptions): Promise<void>;
  getDeployment(scope: DeploymentScope, name: string): Promise<DeploymentRecord>;
  listDeployments(scope: DeploymentScope): Promise<DeploymentRecord[]>;
  listDeploymentOperations(scope: DeploymentScope, name: string): Promise<DeploymentOperation[]>;
  deployPreview(scope: DeploymentScope, request: DeploymentRequest): Promise<ProposedChange[]>;
  computeTemplateHash(subscriptionId: string, template: string): Promise<string>;

  listResourceGroups(subscriptionId: string): Promise<string[]>;
  listResourceGroupResources(subscriptionId: string, resourceGroup: string): Promise<ResourceRecord[]>;
  deleteResourceGroup(subscriptionId: string, resourceGroup: string, options?: OperationOptions): Promise<void>;

  getSoftDeleteState(
    subscriptionId: string,
    resourceType: PurgeableResourceType,
    resourceGroup: string,
    name: string
  ): Promise<SoftDeleteState>;
  purge(subscriptionId: string, candidate: PurgeCandidate, options?: OperationOptions): Promise<void>;

  listLocations(subscriptionId: string): Promise<Location[]>;
  listAiUsages(subscriptionId: string, location: string): Promise<QuotaUsage[]>;
}

export const PURGEABLE_RESOURCE_TYPES: readonly PurgeableResourceType[] = [
  'Microsoft.KeyVault/vaults',
  'Microsoft.KeyVault/managedHSMs',
  'Microsoft.AppConfiguration/configurationStores',
  'Microsoft.ApiManagement/service',
  'Microsoft.CognitiveServices/accounts'
];

/** Canonical purgeable type for a resource type reported in any casing */
export function toPurgeableResourceType(type: string): PurgeableResourceType | undefined {
  return PURGEABLE_RESOURCE_TYPES.find(candidate => candidate.toLowerCase() === type.toLowerCase());
}

export const TagKeys = {
  EnvironmentName: 'provision-env-name',
  ParameterHash: 'provision-param-hash',
  TemplateHash: 'provision-template-hash',
  DeployReason: 'provision-deploy-reason'
} as const;
