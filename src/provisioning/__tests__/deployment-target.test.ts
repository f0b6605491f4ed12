import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DeploymentFailedError,
  DeploymentTimeoutError,
  OperationCancelledError,
  ResourceOperationError
} from '../../errors/index.js';
import { InMemoryControlPlane } from '../../__tests__/fakes.js';
import {
  createDeploymentTarget,
  describeScope,
  emptyTemplateFor,
  progressPortalUrl
} from '../deployment-target.js';
import type { DeploymentScope } from '../types.js';

const subscriptionScope: DeploymentScope = { kind: 'subscription', subscriptionId: 'sub-1', location: 'eastus' };
const resourceGroupScope: DeploymentScope = { kind: 'resourceGroup', subscriptionId: 'sub-1', resourceGroup: 'rg-dev' };

const noDelay = { sleep: async (): Promise<void> => undefined };

describe('DeploymentTarget', () => {
  let controlPlane: InMemoryControlPlane;

  beforeEach(() => {
    controlPlane = new InMemoryControlPlane();
  });

  it('should deploy and read the deployment back', async () => {
    controlPlane.nextOutputs = { WEB_URL: { type: 'String', value: 'https://web.example.com' } };
    const target = createDeploymentTarget(controlPlane, subscriptionScope, 'dev-1', { retry: noDelay });

    const deployment = await target.deploy('{"resources":[]}', { location: 'eastus' }, { 'provision-env-name': 'dev' });

    expect(controlPlane.deployRequests).toEqual([
      {
        scope: subscriptionScope,
        request: {
          name: 'dev-1',
          template: '{"resources":[]}',
          parameters: { location: 'eastus' },
          tags: { 'provision-env-name': 'dev' }
        }
      }
    ]);
    expect(deployment.name).toBe('dev-1');
    expect(deployment.outputs.WEB_URL.value).toBe('https://web.example.com');
  });

  it('should retry until a finished deployment becomes visible', async () => {
    controlPlane.notFoundReads = 3;
    const target = createDeploymentTarget(controlPlane, resourceGroupScope, 'dev-1', { retry: noDelay });

    const deployment = await target.deploy('{}', {}, {});

    expect(deployment.name).toBe('dev-1');
    expect(controlPlane.getDeploymentCalls).toBe(4);
  });

  it('should time out when the deployment never becomes visible', async () => {
    controlPlane.notFoundReads = 10;
    const target = createDeploymentTarget(controlPlane, resourceGroupScope, 'dev-1', { retry: noDelay });

    await expect(target.deploy('{}', {}, {})).rejects.toBeInstanceOf(DeploymentTimeoutError);
    expect(controlPlane.getDeploymentCalls).toBe(10);
  });

  it('should wrap failures of the deployment call', async () => {
    controlPlane.deploy = async () => {
      throw new Error('InvalidTemplate');
    };
    const target = createDeploymentTarget(controlPlane, resourceGroupScope, 'dev-1', { retry: noDelay });

    await expect(target.deploy('{}', {}, {})).rejects.toThrow(
      new DeploymentFailedError('dev-1', new Error('InvalidTemplate'))
    );
  });

  it('should pass typed errors through unchanged', async () => {
    const failure = new ResourceOperationError('Create', 'deployment', 'dev-1', new Error('quota'));
    controlPlane.deploy = async () => {
      throw failure;
    };
    const target = createDeploymentTarget(controlPlane, resourceGroupScope, 'dev-1', { retry: noDelay });

    await expect(target.deploy('{}', {}, {})).rejects.toBe(failure);
  });

  it('should hand the signal to the control plane', async () => {
    const deploy = vi.spyOn(controlPlane, 'deploy');
    const controller = new AbortController();
    const target = createDeploymentTarget(controlPlane, resourceGroupScope, 'dev-1', { retry: noDelay });

    await target.deploy('{}', {}, {}, { signal: controller.signal });

    expect(deploy).toHaveBeenCalledWith(
      resourceGroupScope,
      { name: 'dev-1', template: '{}', parameters: {}, tags: {} },
      { signal: controller.signal }
    );
  });

  it('should stop waiting on a deployment when cancelled', async () => {
    controlPlane.deploy = () => new Promise<void>(() => undefined);
    const controller = new AbortController();
    const target = createDeploymentTarget(controlPlane, resourceGroupScope, 'dev-1', { retry: noDelay });

    const deploying = target.deploy('{}', {}, {}, { signal: controller.signal });
    controller.abort();

    await expect(deploying).rejects.toThrow(new OperationCancelledError('Deployment dev-1 was cancelled'));
    expect(controlPlane.getDeploymentCalls).toBe(0);
  });

  it('should keep the scope when renamed', () => {
    const target = createDeploymentTarget(controlPlane, resourceGroupScope, 'dev-1').withDeploymentName('dev-2');

    expect(target.deploymentName).toBe('dev-2');
    expect(target.scope).toBe(resourceGroupScope);
  });

  it('should describe scopes', () => {
    expect(describeScope(subscriptionScope)).toBe('subscription sub-1 (eastus)');
    expect(describeScope(resourceGroupScope)).toBe('resource group rg-dev');
    expect(progressPortalUrl(subscriptionScope, 'dev-1')).toBe(
      'https://portal.azure.com/#view/HubsExtension/DeploymentDetailsBlade/~/overview/id/' +
        '%2Fsubscriptions%2Fsub-1%2Fproviders%2FMicrosoft.Resources%2Fdeployments%2Fdev-1'
    );
    expect(progressPortalUrl(resourceGroupScope, 'dev-1')).toBe(
      'https://portal.azure.com/#@/resource/subscriptions/sub-1/resourceGroups/rg-dev/overview'
    );
  });

  it('should pick the empty template for the scope', () => {
    expect(emptyTemplateFor(subscriptionScope).$schema).toContain('subscriptionDeploymentTemplate.json');
    expect(emptyTemplateFor(resourceGroupScope).$schema).toContain('/deploymentTemplate.json');
    expect(emptyTemplateFor(resourceGroupScope).resources).toEqual([]);
  });
});
