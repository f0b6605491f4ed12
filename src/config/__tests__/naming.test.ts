import { describe, it, expect } from 'vitest';
import {
  createNamingService,
  deploymentPortalUrl,
  parseResourceId,
  resourceGroupFromResourceId,
  resourceGroupPortalUrl
} from '../naming.js';

const fixedClock = { now: () => new Date('2024-01-01T00:00:00Z') };

describe('Deployment Naming', () => {
  describe('generateDeploymentName', () => {
    it('should append the unix timestamp', () => {
      expect(createNamingService(fixedClock).generateDeploymentName('dev')).toBe('dev-1704067200');
    });

    it('should keep the rightmost characters of long names', () => {
      const name = createNamingService(fixedClock).generateDeploymentName('a'.repeat(70));

      expect(name).toHaveLength(64);
      expect(name).toBe(`${'a'.repeat(53)}-1704067200`);
    });
  });

  describe('parseResourceId', () => {
    it('should parse a resource id', () => {
      expect(
        parseResourceId('/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Web/sites/web1')
      ).toEqual({
        subscriptionId: 'sub-1',
        resourceGroup: 'rg-app',
        provider: 'Microsoft.Web',
        resourceType: 'Microsoft.Web/sites',
        name: 'web1'
      });
    });

    it('should read resource groups in any casing', () => {
      expect(resourceGroupFromResourceId('/subscriptions/sub-1/resourcegroups/rg-app')).toBe('rg-app');
      expect(resourceGroupFromResourceId('/subscriptions/sub-1/providers/Microsoft.Resources/deployments/dev')).toBeUndefined();
    });
  });

  it('should build portal links', () => {
    expect(resourceGroupPortalUrl('sub-1', 'rg-app')).toBe(
      'https://portal.azure.com/#@/resource/subscriptions/sub-1/resourceGroups/rg-app/overview'
    );
    expect(deploymentPortalUrl('/subscriptions/sub-1/deployments/dev')).toBe(
      'https://portal.azure.com/#view/HubsExtension/DeploymentDetailsBlade/~/overview/id/%2Fsubscriptions%2Fsub-1%2Fdeployments%2Fdev'
    );
  });
});
