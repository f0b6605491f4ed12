import { createHash } from 'crypto';
import { describeError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { DeploymentLookup } from '../provisioning/deployment-lookup.js';
import type { DeploymentTarget } from '../provisioning/deployment-target.js';
import { type ControlPlane, TagKeys } from '../provisioning/types.js';
import {
  type DeploymentRecord,
  type JsonValue,
  type ParameterDefinition,
  ProvisioningState,
  type ResolvedParameters
} from '../types/index.js';

/**
 * SHA-256 over the sorted `[name, value]` pairs of every declared parameter. A parameter
 * missing from `resolved` contributes its default, or null. Only values take part, so
 * edits to descriptions or metadata leave the hash alone.
 */
export function computeParameterHash(
  definitions: ReadonlyMap<string, ParameterDefinition>,
  resolved: ResolvedParameters
): string {
  const pairs: [string, JsonValue][] = [...definitions.keys()]
    .sort()
    .map((name): [string, JsonValue] => [name, resolved.get(name)?.value ?? definitions.get(name)?.defaultValue ?? null]);
  return createHash('sha256').update(JSON.stringify(pairs)).digest('hex');
}

export type ReconcileDecision =
  | { action: 'skip'; deployment: DeploymentRecord; templateHash: string; parameterHash: string }
  | { action: 'deploy'; reason: string; templateHash?: string; parameterHash?: string };

export interface ReconcileInput {
  target: DeploymentTarget;
  environmentName: string;
  template: string;
  definitions: ReadonlyMap<string, ParameterDefinition>;
  parameters: ResolvedParameters;
  force?: boolean;
}

/**
 * Decides whether a deployment can be skipped because the newest finished deployment of
 * the environment already ran the same template with the same parameters.
 */
export class DeploymentStateReconciler {
  constructor(
    private readonly controlPlane: Pick<ControlPlane, 'computeTemplateHash'>,
    private readonly lookup: DeploymentLookup,
    private readonly logger: Logger
  ) {}

  async decide(input: ReconcileInput): Promise<ReconcileDecision> {
    let parameterHash: string;
    try {
      parameterHash = computeParameterHash(input.definitions, input.parameters);
    } catch (error) {
      this.logger.warn(`Could not hash the deployment parameters, deploying: ${describeError(error)}`);
      return { action: 'deploy', reason: 'parameter hash unavailable' };
    }

    if (input.force) {
      return { action: 'deploy', reason: 'forced', parameterHash };
    }

    let templateHash: string;
    try {
      templateHash = await this.controlPlane.computeTemplateHash(input.target.scope.subscriptionId, input.template);
    } catch (error) {
      this.logger.warn(`Could not hash the template, deploying: ${describeError(error)}`);
      return { action: 'deploy', reason: 'template hash unavailable', parameterHash };
    }

    let previous: DeploymentRecord;
    try {
      previous = await this.lookup.find(input.target, input.environmentName, { terminalOnly: true });
    } catch (error) {
      this.logger.debug(`Cannot determine the deployment state: ${describeError(error)}`);
      return { action: 'deploy', reason: 'no previous deployment', templateHash, parameterHash };
    }

    if (previous.provisioningState !== ProvisioningState.Succeeded) {
      return { action: 'deploy', reason: 'previous deployment failed', templateHash, parameterHash };
    }

    const previousTemplateHash = previous.tags[TagKeys.TemplateHash] ?? previous.templateHash;
    if (previousTemplateHash !== templateHash) {
      return { action: 'deploy', reason: 'template changed', templateHash, parameterHash };
    }
    if (previous.tags[TagKeys.ParameterHash] !== parameterHash) {
      return { action: 'deploy', reason: 'parameters changed', templateHash, parameterHash };
    }

    return { action: 'skip', deployment: previous, templateHash, parameterHash };
  }
}
