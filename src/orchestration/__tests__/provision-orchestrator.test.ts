import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { MemoryConfigStore } from '../../config/config-store.js';
import { MemoryEnvironmentStore } from '../../config/environment.js';
import { DeploymentNamingService } from '../../config/naming.js';
import type { ProjectConfig } from '../../config/types.js';
import { ConfigurationError, DeploymentFailedError } from '../../errors/index.js';
import { ParameterPrompter } from '../../parameters/prompt.js';
import { ParameterResolver } from '../../parameters/resolver.js';
import { DeploymentLookup } from '../../provisioning/deployment-lookup.js';
import { TagKeys } from '../../provisioning/types.js';
import { ParameterFileLoader } from '../../templates/parameter-file.js';
import type { TemplateCompiler } from '../../templates/types.js';
import type { CompiledTemplate, OutputDefinition, ParameterDefinition, TargetScope } from '../../types/index.js';
import { createTestLogger, deploymentRecord, InMemoryControlPlane, ScriptedConsole } from '../../__tests__/fakes.js';
import { DeploymentStateReconciler } from '../state-reconciler.js';
import { ProvisionOrchestrator } from '../provision-orchestrator.js';
import type { OrchestrationContext } from '../types.js';

function waitForAbort(_ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });
}

function compiledTemplate(targetScope: TargetScope): CompiledTemplate {
  return {
    modulePath: 'main.json',
    rawArtifact: '{"resources":[]}',
    parameters: new Map<string, ParameterDefinition>([
      ['environmentName', { type: 'string', secure: false }],
      ['location', { type: 'string', secure: false, metadata: { type: 'location' } }]
    ]),
    outputs: new Map<string, OutputDefinition>([['WEB_URL', { type: 'string' }]]),
    targetScope
  };
}

describe('ProvisionOrchestrator', () => {
  let projectRoot: string;
  let controlPlane: InMemoryControlPlane;
  let console: ScriptedConsole;
  let logger: ReturnType<typeof createTestLogger>;
  let environment: MemoryEnvironmentStore;

  beforeAll(async () => {
    projectRoot = await mkdtemp(join(tmpdir(), 'provision-'));
    await mkdir(join(projectRoot, 'infra'));
    await writeFile(
      join(projectRoot, 'infra', 'main.parameters.json'),
      JSON.stringify({
        parameters: {
          environmentName: { value: '${AZURE_ENV_NAME}' },
          location: { value: 'eastus' }
        }
      })
    );
  });

  afterAll(async () => {
    await rm(projectRoot, { recursive: true, force: true });
  });

  beforeEach(() => {
    controlPlane = new InMemoryControlPlane();
    controlPlane.nextOutputs = { weB_URL: { type: 'String', value: 'https://web.example.com' } };
    console = new ScriptedConsole();
    logger = createTestLogger();
    environment = new MemoryEnvironmentStore('dev');
  });

  function orchestrator(
    targetScope: TargetScope = 'subscription',
    azure: ProjectConfig['azure'] = { subscription_id: 'sub-1', location: 'eastus' }
  ): ProvisionOrchestrator {
    const template = compiledTemplate(targetScope);
    const compiler: TemplateCompiler = { compile: async () => template };
    const lookup = new DeploymentLookup(console, logger);
    const context: OrchestrationContext = {
      projectRoot,
      project: { name: 'todo', infra: { path: 'infra', module: 'main' }, azure },
      environment,
      config: new MemoryConfigStore(),
      session: {}
    };
    return new ProvisionOrchestrator(
      {
        compiler,
        parameterFiles: new ParameterFileLoader(logger),
        resolver: new ParameterResolver(new ParameterPrompter(console, controlPlane, logger), context.config, logger),
        reconciler: new DeploymentStateReconciler(controlPlane, lookup, logger),
        lookup,
        controlPlane,
        naming: new DeploymentNamingService({ now: () => new Date('2024-01-01T00:00:00Z') }),
        console,
        logger,
        target: { retry: { sleep: async () => undefined } },
        progress: { sleep: waitForAbort }
      },
      context
    );
  }

  it('should deploy and write the outputs to the environment', async () => {
    const result = await orchestrator().provision();

    expect(result.status).toBe('deployed');
    expect(result.metadata.deploymentName).toBe('dev-1704067200');
    expect(controlPlane.deployRequests).toHaveLength(1);
    expect(controlPlane.deployRequests[0].scope).toEqual({
      kind: 'subscription',
      subscriptionId: 'sub-1',
      location: 'eastus'
    });
    expect(controlPlane.deployRequests[0].request).toEqual({
      name: 'dev-1704067200',
      template: '{"resources":[]}',
      parameters: { environmentName: 'dev', location: 'eastus' },
      tags: {
        [TagKeys.EnvironmentName]: 'dev',
        [TagKeys.ParameterHash]: expect.stringMatching(/^[0-9a-f]{64}$/),
        [TagKeys.TemplateHash]: 'template-hash'
      }
    });
    expect(result.outputs).toEqual({ WEB_URL: { type: 'string', value: 'https://web.example.com' } });
    expect(console.messages).toContain(
      'You can view detailed progress in the portal:\n' +
        'https://portal.azure.com/#view/HubsExtension/DeploymentDetailsBlade/~/overview/id/' +
        '%2Fsubscriptions%2Fsub-1%2Fproviders%2FMicrosoft.Resources%2Fdeployments%2Fdev-1704067200'
    );
    expect(environment.values()).toEqual({
      AZURE_ENV_NAME: 'dev',
      AZURE_SUBSCRIPTION_ID: 'sub-1',
      AZURE_LOCATION: 'eastus',
      WEB_URL: 'https://web.example.com'
    });
    expect(console.spinners).toEqual(['Creating/Updating resources in subscription sub-1 (eastus)']);
    expect(console.stoppedSpinners).toEqual([{ text: 'Deployed dev-1704067200', outcome: 'success' }]);
  });

  it('should skip a second provision with nothing changed', async () => {
    await orchestrator().provision();

    const result = await orchestrator().provision();

    expect(result.status).toBe('skipped');
    expect(result.skippedReason).toBe('DeploymentStateSkipped');
    expect(result.outputs).toEqual({ WEB_URL: { type: 'string', value: 'https://web.example.com' } });
    expect(controlPlane.deployRequests).toHaveLength(1);
    expect(console.messages).toContain('There are no changes to provision for your application.');
  });

  it('should deploy again when forced', async () => {
    await orchestrator().provision();

    const result = await orchestrator().provision({ force: true });

    expect(result.status).toBe('deployed');
    expect(controlPlane.deployRequests).toHaveLength(2);
    expect(controlPlane.deployRequests[1].request.tags[TagKeys.TemplateHash]).toBeUndefined();
  });

  it('should stop the spinner and rethrow when the deployment fails', async () => {
    controlPlane.deploy = async () => {
      throw new Error('InvalidTemplate');
    };

    await expect(orchestrator().provision()).rejects.toThrow(
      new DeploymentFailedError('dev-1704067200', new Error('InvalidTemplate'))
    );
    expect(console.stoppedSpinners).toEqual([{ text: 'Deployment failed', outcome: 'failure' }]);
    expect(environment.get('WEB_URL')).toBeUndefined();
  });

  it('should point at the portal and record the group for a resource group deployment', async () => {
    await orchestrator('resourceGroup', { subscription_id: 'sub-1', resource_group: 'rg-dev' }).provision();

    expect(console.messages).toContain(
      'You can view detailed progress in the portal:\n' +
        'https://portal.azure.com/#@/resource/subscriptions/sub-1/resourceGroups/rg-dev/overview'
    );
    expect(controlPlane.deployRequests[0].scope).toEqual({
      kind: 'resourceGroup',
      subscriptionId: 'sub-1',
      resourceGroup: 'rg-dev'
    });
    expect(environment.get('AZURE_RESOURCE_GROUP')).toBe('rg-dev');
    expect(environment.get('AZURE_LOCATION')).toBeUndefined();
  });

  it('should preview the changes without deploying', async () => {
    controlPlane.previewChanges = [{ resourceId: '/subscriptions/sub-1/resourceGroups/rg-dev', changeType: 'Create' }];

    const preview = await orchestrator().preview();

    expect(preview).toEqual({
      deploymentName: 'dev-1704067200',
      scope: { kind: 'subscription', subscriptionId: 'sub-1', location: 'eastus' },
      changes: [{ resourceId: '/subscriptions/sub-1/resourceGroups/rg-dev', changeType: 'Create' }]
    });
    expect(controlPlane.deployRequests).toHaveLength(0);
    expect(console.stoppedSpinners).toEqual([{ text: 'Generated infrastructure preview', outcome: 'success' }]);
  });

  it('should report the state of the latest deployment', async () => {
    const latest = deploymentRecord({
      name: 'dev-1',
      tags: { [TagKeys.EnvironmentName]: 'dev' },
      outputs: { web_url: { type: 'String', value: 'https://old.example.com' } },
      outputResourceIds: ['/subscriptions/sub-1/resourceGroups/rg-dev']
    });
    controlPlane.deployments = [latest];

    const state = await orchestrator().state();

    expect(state).toEqual({
      deployment: latest,
      outputs: { WEB_URL: { type: 'string', value: 'https://old.example.com' } },
      resourceIds: ['/subscriptions/sub-1/resourceGroups/rg-dev']
    });
  });

  it('should require a subscription', async () => {
    const provisioning = orchestrator('subscription', { location: 'eastus' }).provision();

    await expect(provisioning).rejects.toBeInstanceOf(ConfigurationError);
    await expect(provisioning).rejects.toThrow('No subscription is selected');
  });
});
