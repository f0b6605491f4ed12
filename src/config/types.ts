import type { JsonValue } from '../types/index.js';

// Configuration-specific types
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface InfraSettings {
  path: string;
  module: string;
  parameters_file?: string;
}

export interface AzureSettings {
  subscription_id?: string;
  location?: string;
  resource_group?: string;
}

export interface ProjectConfig {
  name: string;
  infra: InfraSettings;
  environment?: {
    name?: string;
  };
  azure: AzureSettings;
}

/** Persisted key-value configuration addressed by dotted keys, e.g. `infra.parameters.location` */
export interface ConfigStore {
  get(key: string): JsonValue | undefined;
  set(key: string, value: JsonValue): void;
  unset(key: string): void;
  /** The only durability point */
  save(): Promise<void>;
}

/** Flat string values of one environment (`.env` style) */
export interface EnvironmentStore {
  readonly name: string;
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  unset(key: string): void;
  values(): Record<string, string>;
  save(): Promise<void>;
}

export const EnvironmentKeys = {
  EnvironmentName: 'AZURE_ENV_NAME',
  SubscriptionId: 'AZURE_SUBSCRIPTION_ID',
  Location: 'AZURE_LOCATION',
  ResourceGroup: 'AZURE_RESOURCE_GROUP'
} as const;

export const PARAMETER_CONFIG_PREFIX = 'infra.parameters';
