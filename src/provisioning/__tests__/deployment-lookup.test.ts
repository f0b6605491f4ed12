import { describe, it, expect, beforeEach } from 'vitest';
import { NoDeploymentsFoundError } from '../../errors/index.js';
import { deploymentRecord, InMemoryControlPlane, ScriptedConsole } from '../../__tests__/fakes.js';
import { ProvisioningState } from '../../types/index.js';
import { DeploymentLookup, isTerminalState, matchEnvironmentDeployments } from '../deployment-lookup.js';
import { createDeploymentTarget } from '../deployment-target.js';
import { TagKeys } from '../types.js';

const tagged = deploymentRecord({
  name: 'dev-100',
  tags: { [TagKeys.EnvironmentName]: 'dev' },
  timestamp: new Date('2024-01-01T00:00:00Z')
});
const exactName = deploymentRecord({ name: 'dev', timestamp: new Date('2024-02-01T00:00:00Z') });
const older = deploymentRecord({ name: 'dev-200', timestamp: new Date('2024-03-01T00:00:00Z') });
const newer = deploymentRecord({ name: 'dev-300', timestamp: new Date('2024-03-02T00:00:00Z') });
const running = deploymentRecord({
  name: 'dev-400',
  provisioningState: ProvisioningState.Running,
  timestamp: new Date('2024-03-03T00:00:00Z')
});
const unrelated = deploymentRecord({ name: 'prod-500', timestamp: new Date('2024-03-04T00:00:00Z') });

describe('matchEnvironmentDeployments', () => {
  it('should prefer the tagged deployment even when it is older', () => {
    expect(matchEnvironmentDeployments([older, exactName, tagged, newer], 'dev')).toEqual([tagged]);
  });

  it('should pick the newest of several tagged deployments', () => {
    const newerTagged = { ...tagged, name: 'dev-600', timestamp: new Date('2024-04-01T00:00:00Z') };

    expect(matchEnvironmentDeployments([tagged, newerTagged], 'dev')).toEqual([newerTagged]);
  });

  it('should fall back to the deployment named like the environment', () => {
    expect(matchEnvironmentDeployments([older, exactName], 'dev')).toEqual([exactName]);
  });

  it('should fall back to finished deployments containing the hint, newest first', () => {
    expect(matchEnvironmentDeployments([older, running, unrelated, newer], 'dev')).toEqual([newer, older]);
  });

  it('should treat only succeeded and failed deployments as finished', () => {
    expect(isTerminalState(ProvisioningState.Failed)).toBe(true);
    expect(isTerminalState(ProvisioningState.Canceled)).toBe(false);
    expect(isTerminalState(ProvisioningState.Running)).toBe(false);
  });
});

describe('DeploymentLookup', () => {
  let controlPlane: InMemoryControlPlane;
  let console: ScriptedConsole;
  let lookup: DeploymentLookup;

  beforeEach(() => {
    controlPlane = new InMemoryControlPlane();
    console = new ScriptedConsole();
    lookup = new DeploymentLookup(console);
  });

  function target() {
    return createDeploymentTarget(controlPlane, { kind: 'resourceGroup', subscriptionId: 'sub-1', resourceGroup: 'rg-dev' }, 'dev');
  }

  it('should fail when nothing matches', async () => {
    controlPlane.deployments = [unrelated];

    await expect(lookup.find(target(), 'dev')).rejects.toBeInstanceOf(NoDeploymentsFoundError);
  });

  it('should return a single match without asking', async () => {
    controlPlane.deployments = [tagged, unrelated];

    await expect(lookup.find(target(), 'dev')).resolves.toBe(tagged);
    expect(console.selects).toHaveLength(0);
  });

  it('should ignore unfinished deployments when asked for finished ones only', async () => {
    const taggedRunning = { ...running, tags: { [TagKeys.EnvironmentName]: 'dev' } };
    controlPlane.deployments = [tagged, taggedRunning];

    await expect(lookup.find(target(), 'dev')).resolves.toBe(taggedRunning);
    await expect(lookup.find(target(), 'dev', { terminalOnly: true })).resolves.toBe(tagged);
  });

  it('should ask which of several matches to use', async () => {
    controlPlane.deployments = [older, newer];
    console.answerSelects(1);

    const deployment = await lookup.find(target(), 'dev');

    expect(deployment).toBe(older);
    expect(console.selects[0]).toEqual({
      message: "Several deployments match the environment 'dev'. Select the one to use:",
      options: ['dev-300 (2024-03-02T00:00:00.000Z)', 'dev-200 (2024-03-01T00:00:00.000Z)'],
      defaultValue: 'dev-300 (2024-03-02T00:00:00.000Z)'
    });
  });
});
