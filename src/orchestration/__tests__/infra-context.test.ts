import { describe, it, expect } from 'vitest';
import { MemoryConfigStore } from '../../config/config-store.js';
import { MemoryEnvironmentStore } from '../../config/environment.js';
import type { AzureSettings } from '../../config/types.js';
import type { OutputDefinition } from '../../types/index.js';
import {
  createOutputParameters,
  deploymentScopeFor,
  outputEnvValue,
  parameterFilePath,
  templatePath
} from '../infra-context.js';
import type { OrchestrationContext } from '../types.js';

function context(azure: AzureSettings, values: Record<string, string> = {}, location?: string): OrchestrationContext {
  return {
    projectRoot: '/work/todo',
    project: { name: 'todo', infra: { path: 'infra', module: 'main' }, azure },
    environment: new MemoryEnvironmentStore('dev', values),
    config: new MemoryConfigStore(),
    session: { location }
  };
}

describe('infra paths', () => {
  it('should resolve the module and its parameters file under the infra directory', () => {
    const ctx = context({});

    expect(templatePath(ctx)).toBe('/work/todo/infra/main.json');
    expect(parameterFilePath(ctx)).toBe('/work/todo/infra/main.parameters.json');
  });

  it('should honour an absolute infra path and a custom parameters file', () => {
    const ctx = context({});
    ctx.project.infra = { path: '/shared/infra', module: 'app', parameters_file: 'app.dev.json' };

    expect(templatePath(ctx)).toBe('/shared/infra/app.json');
    expect(parameterFilePath(ctx)).toBe('/shared/infra/app.dev.json');
  });
});

describe('deploymentScopeFor', () => {
  it('should prefer environment values over the project file', () => {
    const ctx = context(
      { subscription_id: 'sub-project', location: 'westus' },
      { AZURE_SUBSCRIPTION_ID: 'sub-env', AZURE_LOCATION: 'eastus' }
    );

    expect(deploymentScopeFor('subscription', ctx, true)).toEqual({
      kind: 'subscription',
      subscriptionId: 'sub-env',
      location: 'eastus'
    });
  });

  it('should take a location chosen during parameter resolution', () => {
    expect(deploymentScopeFor('subscription', context({ subscription_id: 'sub-1' }, {}, 'northeurope'), true)).toEqual({
      kind: 'subscription',
      subscriptionId: 'sub-1',
      location: 'northeurope'
    });
  });

  it('should require a location only when asked to', () => {
    const ctx = context({ subscription_id: 'sub-1' });

    expect(() => deploymentScopeFor('subscription', ctx, true)).toThrow(
      'No location is selected for the subscription deployment'
    );
    expect(deploymentScopeFor('subscription', ctx, false)).toEqual({
      kind: 'subscription',
      subscriptionId: 'sub-1',
      location: ''
    });
  });

  it('should require a resource group for resource group templates', () => {
    expect(() => deploymentScopeFor('resourceGroup', context({ subscription_id: 'sub-1' }), false)).toThrow(
      'The template deploys to a resource group but none is configured'
    );
    expect(
      deploymentScopeFor('resourceGroup', context({ subscription_id: 'sub-1', resource_group: 'rg-dev' }), false)
    ).toEqual({ kind: 'resourceGroup', subscriptionId: 'sub-1', resourceGroup: 'rg-dev' });
  });
});

describe('createOutputParameters', () => {
  const declared = new Map<string, OutputDefinition>([
    ['WEB_URL', { type: 'string' }],
    ['REPLICAS', { type: 'number' }]
  ]);

  it('should restore the declared casing and types', () => {
    expect(
      createOutputParameters(declared, {
        web_url: { type: 'String', value: 'https://web.example.com' },
        replicas: { type: 'Int', value: 3 }
      })
    ).toEqual({
      WEB_URL: { type: 'string', value: 'https://web.example.com' },
      REPLICAS: { type: 'number', value: 3 }
    });
  });

  it('should keep undeclared outputs and map their control plane types', () => {
    expect(
      createOutputParameters(declared, {
        enabled: { type: 'Bool', value: true },
        tags: { type: 'Object', value: { team: 'web' } },
        hosts: { type: 'Array', value: ['a', 'b'] },
        other: { value: 'x' }
      })
    ).toEqual({
      enabled: { type: 'boolean', value: true },
      tags: { type: 'object', value: { team: 'web' } },
      hosts: { type: 'array', value: ['a', 'b'] },
      other: { type: 'string', value: 'x' }
    });
  });

  it('should write non-string values to the environment as JSON', () => {
    expect(outputEnvValue('plain')).toBe('plain');
    expect(outputEnvValue(3)).toBe('3');
    expect(outputEnvValue({ team: 'web' })).toBe('{"team":"web"}');
  });
});
