import { isAbsolute, join } from 'path';
import { EnvironmentKeys } from '../config/types.js';
import { ConfigurationError } from '../errors/index.js';
import type { DeploymentScope } from '../provisioning/types.js';
import type {
  DeploymentOutput,
  JsonValue,
  OutputDefinition,
  OutputParameter,
  ParameterType,
  TargetScope
} from '../types/index.js';
import type { OrchestrationContext } from './types.js';

function infraDirectory(context: OrchestrationContext): string {
  const { path } = context.project.infra;
  return isAbsolute(path) ? path : join(context.projectRoot, path);
}

/** `<infra.path>/<infra.module>.json` */
export function templatePath(context: OrchestrationContext): string {
  return join(infraDirectory(context), `${context.project.infra.module}.json`);
}

/** `<infra.path>/<infra.parameters_file>`, by default `<module>.parameters.json` */
export function parameterFilePath(context: OrchestrationContext): string {
  const { module, parameters_file: parametersFile } = context.project.infra;
  return join(infraDirectory(context), parametersFile ?? `${module}.parameters.json`);
}

export function subscriptionIdOf(context: OrchestrationContext): string {
  const subscriptionId =
    context.environment.get(EnvironmentKeys.SubscriptionId) ?? context.project.azure.subscription_id;
  if (!subscriptionId) {
    throw new ConfigurationError('No subscription is selected', {
      remediation: `Set ${EnvironmentKeys.SubscriptionId} in the environment or azure.subscription_id in provision.yaml`
    });
  }
  return subscriptionId;
}

export function locationOf(context: OrchestrationContext): string | undefined {
  return (
    context.environment.get(EnvironmentKeys.Location) ?? context.session.location ?? context.project.azure.location
  );
}

/**
 * Builds the deployment scope for a template. Reading existing deployments needs no
 * location, so `requireLocation` is only set for operations that create one.
 */
export function deploymentScopeFor(
  targetScope: TargetScope,
  context: OrchestrationContext,
  requireLocation: boolean
): DeploymentScope {
  const subscriptionId = subscriptionIdOf(context);

  if (targetScope === 'resourceGroup') {
    const resourceGroup =
      context.environment.get(EnvironmentKeys.ResourceGroup) ?? context.project.azure.resource_group;
    if (!resourceGroup) {
      throw new ConfigurationError('The template deploys to a resource group but none is configured', {
        remediation: `Set ${EnvironmentKeys.ResourceGroup} in the environment or azure.resource_group in provision.yaml`
      });
    }
    return { kind: 'resourceGroup', subscriptionId, resourceGroup };
  }

  const location = locationOf(context);
  if (!location && requireLocation) {
    throw new ConfigurationError('No location is selected for the subscription deployment', {
      remediation: `Set ${EnvironmentKeys.Location} in the environment or azure.location in provision.yaml`
    });
  }
  return { kind: 'subscription', subscriptionId, location: location ?? '' };
}

function outputTypeFromArmType(armType: string | undefined): ParameterType {
  switch (armType?.toLowerCase()) {
    case 'bool':
    case 'boolean':
      return 'boolean';
    case 'int':
      return 'number';
    case 'array':
      return 'array';
    case 'object':
    case 'secureobject':
      return 'object';
    default:
      return 'string';
  }
}

/**
 * Maps deployment outputs back to the names the template declares. The control plane
 * may change the casing of output names; undeclared outputs keep theirs.
 */
export function createOutputParameters(
  declared: ReadonlyMap<string, OutputDefinition>,
  outputs: Record<string, DeploymentOutput>
): Record<string, OutputParameter> {
  const declaredByLowerName = new Map<string, string>();
  for (const name of declared.keys()) {
    declaredByLowerName.set(name.toLowerCase(), name);
  }

  const result: Record<string, OutputParameter> = {};
  for (const [name, output] of Object.entries(outputs)) {
    const declaredName = declaredByLowerName.get(name.toLowerCase()) ?? name;
    result[declaredName] = {
      type: declared.get(declaredName)?.type ?? outputTypeFromArmType(output.type),
      value: output.value
    };
  }
  return result;
}

/** Text written to the environment for an output value */
export function outputEnvValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
