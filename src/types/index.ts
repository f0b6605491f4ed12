// Core type definitions for infra-provision

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type ParameterType = 'string' | 'boolean' | 'number' | 'array' | 'object';

export type TargetScope = 'subscription' | 'resourceGroup';

/**
 * Values arrive from template files, parameter files and saved config as untyped JSON.
 * Inside the engine every value is carried in this closed variant.
 */
export type ParameterValue =
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'array'; value: JsonValue[] }
  | { kind: 'object'; value: JsonObject };

export interface GenerationPolicy {
  length?: number;
  noLower?: boolean;
  noUpper?: boolean;
  noNumeric?: boolean;
  noSpecial?: boolean;
  minLower?: number;
  minUpper?: number;
  minNumeric?: number;
  minSpecial?: number;
}

export type ParameterMetadataType = 'location' | 'generate' | 'generateOrManual' | 'resourceGroup';

/** Tool-specific extension metadata found under `metadata.provision` of a template parameter */
export interface ParameterMetadata {
  type?: ParameterMetadataType;
  default?: JsonValue;
  /** Quota requirements, `"<usage name>[, <capacity>]"` */
  usageName?: string[];
  config?: GenerationPolicy;
}

export interface ParameterDefinition {
  type: ParameterType;
  secure: boolean;
  defaultValue?: JsonValue;
  allowedValues?: JsonValue[];
  minValue?: number;
  maxValue?: number;
  minLength?: number;
  maxLength?: number;
  description?: string;
  metadata?: ParameterMetadata;
}

export interface OutputDefinition {
  type: ParameterType;
}

export interface CompiledTemplate {
  /** Path of the module the template was compiled from */
  modulePath: string;
  /** Deployment artifact as sent to the control plane */
  rawArtifact: string;
  /** Declaration order is preserved */
  parameters: Map<string, ParameterDefinition>;
  outputs: Map<string, OutputDefinition>;
  targetScope: TargetScope;
}

/** Fully concrete inputs for one deployment attempt */
export type ResolvedParameters = Map<string, ParameterValue>;

export const ProvisioningState = {
  Accepted: 'Accepted',
  Running: 'Running',
  Succeeded: 'Succeeded',
  Failed: 'Failed',
  Canceled: 'Canceled',
  Deleting: 'Deleting'
} as const;

export interface ResourceReference {
  id?: string;
  resourceType?: string;
  resourceName?: string;
}

export interface DeploymentDependency extends ResourceReference {
  dependsOn: ResourceReference[];
}

export interface DeploymentOutput {
  type?: string;
  value: JsonValue;
}

export interface DeploymentRecord {
  id: string;
  name: string;
  /** Set for subscription-scoped deployments */
  location?: string;
  provisioningState: string;
  timestamp: Date;
  tags: Record<string, string>;
  outputs: Record<string, DeploymentOutput>;
  outputResourceIds: string[];
  dependencies: DeploymentDependency[];
  templateHash?: string;
}

export interface OutputParameter {
  type: ParameterType;
  value: JsonValue;
}

export type PurgeableResourceType =
  | 'Microsoft.KeyVault/vaults'
  | 'Microsoft.KeyVault/managedHSMs'
  | 'Microsoft.AppConfiguration/configurationStores'
  | 'Microsoft.ApiManagement/service'
  | 'Microsoft.CognitiveServices/accounts';

export interface PurgeCandidate {
  resourceType: PurgeableResourceType;
  name: string;
  resourceGroup: string;
  location: string;
  /** Only meaningful for cognitive service accounts */
  kind?: string;
  softDeleteEnabled: boolean;
  purgeProtectionEnabled: boolean;
}

export interface ProposedChange {
  resourceId: string;
  changeType: string;
}
