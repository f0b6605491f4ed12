import type { CompiledTemplate, JsonObject, JsonValue } from '../types/index.js';

// Template-specific types
export interface TemplateCompiler {
  compile(modulePath: string): Promise<CompiledTemplate>;
}

export interface ArmParameterDefinition {
  type: string;
  defaultValue?: JsonValue;
  allowedValues?: JsonValue[];
  minValue?: number;
  maxValue?: number;
  minLength?: number;
  maxLength?: number;
  metadata?: JsonObject;
}

export interface ArmOutputDefinition {
  type: string;
  value?: JsonValue;
}

export interface ArmTemplate {
  $schema: string;
  contentVersion: string;
  parameters?: Record<string, ArmParameterDefinition>;
  resources: JsonValue;
  outputs?: Record<string, ArmOutputDefinition>;
}

/** `{ parameters: { name: { value } } }` */
export interface ArmParameterFile {
  $schema?: string;
  contentVersion?: string;
  parameters: Record<string, { value?: JsonValue; reference?: JsonObject }>;
}

export const EMPTY_SUBSCRIPTION_TEMPLATE: ArmTemplate = {
  $schema: 'https://schema.management.azure.com/schemas/2018-05-01/subscriptionDeploymentTemplate.json#',
  contentVersion: '1.0.0.0',
  resources: []
};

export const EMPTY_RESOURCE_GROUP_TEMPLATE: ArmTemplate = {
  $schema: 'https://schema.management.azure.com/schemas/2019-04-01/deploymentTemplate.json#',
  contentVersion: '1.0.0.0',
  resources: []
};
