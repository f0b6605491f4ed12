import { EnvironmentKeys } from '../config/types.js';
import type { DeploymentNamingService } from '../config/naming.js';
import type { Console } from '../console/types.js';
import type { Logger } from '../logger.js';
import type { ParameterResolver } from '../parameters/resolver.js';
import { toDeploymentParameters } from '../parameters/values.js';
import type { DeploymentLookup } from '../provisioning/deployment-lookup.js';
import {
  createDeploymentTarget,
  type DeploymentTarget,
  type DeploymentTargetOptions,
  describeScope,
  progressPortalUrl
} from '../provisioning/deployment-target.js';
import { DeploymentProgressReporter, type ProgressReporterOptions } from '../provisioning/progress-reporter.js';
import { type ControlPlane, type DeploymentScope, TagKeys } from '../provisioning/types.js';
import type { ParameterFileLoader } from '../templates/parameter-file.js';
import type { TemplateCompiler } from '../templates/types.js';
import type { CompiledTemplate, DeploymentRecord, OutputParameter, ResolvedParameters } from '../types/index.js';
import {
  createOutputParameters,
  deploymentScopeFor,
  outputEnvValue,
  parameterFilePath,
  subscriptionIdOf,
  templatePath
} from './infra-context.js';
import type { DeploymentStateReconciler } from './state-reconciler.js';
import type {
  OrchestrationContext,
  PreviewResult,
  ProvisionOptions,
  ProvisionResult,
  StateResult
} from './types.js';

export interface ProvisionDependencies {
  compiler: TemplateCompiler;
  parameterFiles: ParameterFileLoader;
  resolver: ParameterResolver;
  reconciler: DeploymentStateReconciler;
  lookup: DeploymentLookup;
  controlPlane: ControlPlane;
  naming: DeploymentNamingService;
  console: Console;
  logger: Logger;
  target?: DeploymentTargetOptions;
  progress?: ProgressReporterOptions;
}

interface PreparedDeployment {
  template: CompiledTemplate;
  parameters: ResolvedParameters;
  scope: DeploymentScope;
}

/**
 * Provisions the environment's infrastructure: compile, resolve parameters, decide
 * whether anything changed, deploy, and write the outputs to the environment.
 */
export class ProvisionOrchestrator {
  constructor(
    private readonly deps: ProvisionDependencies,
    private readonly context: OrchestrationContext
  ) {}

  async provision(options: ProvisionOptions = {}): Promise<ProvisionResult> {
    const startTime = Date.now();
    const environmentName = this.context.environment.name;

    // Step 1: Compile the template and resolve its parameters
    const { template, parameters, scope } = await this.prepare();
    const target = this.createTarget(scope, this.deps.naming.generateDeploymentName(environmentName));

    // Step 2: Skip when the last deployment already ran this template with these parameters
    const decision = await this.deps.reconciler.decide({
      target,
      environmentName,
      template: template.rawArtifact,
      definitions: template.parameters,
      parameters,
      force: options.force
    });

    if (decision.action === 'skip') {
      this.deps.console.message('There are no changes to provision for your application.');
      const outputs = createOutputParameters(template.outputs, decision.deployment.outputs);
      await this.writeEnvironment(scope, outputs);
      return {
        status: 'skipped',
        skippedReason: 'DeploymentStateSkipped',
        deployment: decision.deployment,
        outputs,
        metadata: {
          deploymentName: decision.deployment.name,
          scope,
          timestamp: new Date(),
          duration: Date.now() - startTime
        }
      };
    }
    this.deps.logger.debug(`Deploying ${target.deploymentName}: ${decision.reason}`);

    // Step 3: Deploy, reporting progress in the background
    const tags: Record<string, string> = { [TagKeys.EnvironmentName]: environmentName };
    if (decision.parameterHash) {
      tags[TagKeys.ParameterHash] = decision.parameterHash;
    }
    if (decision.templateHash) {
      tags[TagKeys.TemplateHash] = decision.templateHash;
    }

    this.deps.console.message(
      `You can view detailed progress in the portal:\n${progressPortalUrl(scope, target.deploymentName)}`
    );

    const reporter = new DeploymentProgressReporter(target, this.deps.console, this.deps.logger, this.deps.progress);
    this.deps.console.showSpinner(`Creating/Updating resources in ${describeScope(scope)}`);
    reporter.start();

    let deployment: DeploymentRecord;
    try {
      deployment = await target.deploy(template.rawArtifact, toDeploymentParameters(parameters), tags, {
        signal: options.signal
      });
    } catch (error) {
      await reporter.stop();
      this.deps.console.stopSpinner('Deployment failed', 'failure');
      throw error;
    }
    await reporter.stop();
    this.deps.console.stopSpinner(`Deployed ${target.deploymentName}`, 'success');

    // Step 4: Write outputs to the environment
    const outputs = createOutputParameters(template.outputs, deployment.outputs);
    await this.writeEnvironment(scope, outputs);

    return {
      status: 'deployed',
      deployment,
      outputs,
      metadata: {
        deploymentName: target.deploymentName,
        scope,
        timestamp: new Date(),
        duration: Date.now() - startTime
      }
    };
  }

  /** Changes a deployment would make, without making them */
  async preview(): Promise<PreviewResult> {
    const { template, parameters, scope } = await this.prepare();
    const target = this.createTarget(scope, this.deps.naming.generateDeploymentName(this.context.environment.name));

    this.deps.console.showSpinner('Generating infrastructure preview');
    try {
      const changes = await target.deployPreview(template.rawArtifact, toDeploymentParameters(parameters));
      this.deps.console.stopSpinner('Generated infrastructure preview', 'success');
      return { deploymentName: target.deploymentName, scope, changes };
    } catch (error) {
      this.deps.console.stopSpinner('Preview failed', 'failure');
      throw error;
    }
  }

  /** Outputs and resources of the environment's latest deployment */
  async state(): Promise<StateResult> {
    const template = await this.deps.compiler.compile(templatePath(this.context));
    const scope = deploymentScopeFor(template.targetScope, this.context, false);
    const target = this.createTarget(scope, this.context.environment.name);

    const deployment = await this.deps.lookup.find(target, this.context.environment.name);
    return {
      deployment,
      outputs: createOutputParameters(template.outputs, deployment.outputs),
      resourceIds: deployment.outputResourceIds
    };
  }

  private async prepare(): Promise<PreparedDeployment> {
    const modulePath = templatePath(this.context);
    const template = await this.deps.compiler.compile(modulePath);

    const environment = this.context.environment;
    const parameterFile = await this.deps.parameterFiles.load(
      parameterFilePath(this.context),
      name => environment.get(name) ?? process.env[name]
    );

    const parameters = await this.deps.resolver.resolve({
      modulePath,
      parameters: template.parameters,
      parameterFile,
      session: this.context.session,
      subscriptionId: subscriptionIdOf(this.context)
    });

    // A location prompted during resolution completes a subscription scope
    const scope = deploymentScopeFor(template.targetScope, this.context, true);
    return { template, parameters, scope };
  }

  private createTarget(scope: DeploymentScope, deploymentName: string): DeploymentTarget {
    return createDeploymentTarget(this.deps.controlPlane, scope, deploymentName, {
      logger: this.deps.logger,
      ...this.deps.target
    });
  }

  private async writeEnvironment(scope: DeploymentScope, outputs: Record<string, OutputParameter>): Promise<void> {
    const environment = this.context.environment;
    environment.set(EnvironmentKeys.SubscriptionId, scope.subscriptionId);
    if (scope.kind === 'subscription') {
      environment.set(EnvironmentKeys.Location, scope.location);
    } else {
      environment.set(EnvironmentKeys.ResourceGroup, scope.resourceGroup);
    }
    for (const [name, output] of Object.entries(outputs)) {
      environment.set(name, outputEnvValue(output.value));
    }
    await environment.save();
  }
}

export function createProvisionOrchestrator(
  deps: ProvisionDependencies,
  context: OrchestrationContext
): ProvisionOrchestrator {
  return new ProvisionOrchestrator(deps, context);
}
