/**
 * Naming rules for deployments and the resource identifiers they produce.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

/**
 * Parsed form of `/subscriptions/<sub>/resourceGroups/<rg>/providers/<ns>/<type>/<name>`
 */
export interface ResourceId {
  subscriptionId?: string;
  resourceGroup?: string;
  provider?: string;
  resourceType?: string;
  name?: string;
}

export class DeploymentNamingService {
  /** ARM rejects longer deployment names */
  readonly maxDeploymentNameLength = 64;

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * `<environment-name>-<unix-timestamp>`. When too long, the rightmost characters are kept
   * so the timestamp survives.
   */
  generateDeploymentName(baseName: string): string {
    const timestamp = Math.floor(this.clock.now().getTime() / 1000);
    const name = `${baseName}-${timestamp}`;
    if (name.length <= this.maxDeploymentNameLength) {
      return name;
    }
    return name.substring(name.length - this.maxDeploymentNameLength);
  }
}

export function parseResourceId(id: string): ResourceId {
  const segments = id.split('/').filter(Boolean);
  const result: ResourceId = {};

  for (let i = 0; i < segments.length - 1; i++) {
    const key = segments[i].toLowerCase();
    const value = segments[i + 1];
    if (key === 'subscriptions' && result.subscriptionId === undefined) {
      result.subscriptionId = value;
    } else if (key === 'resourcegroups' && result.resourceGroup === undefined) {
      result.resourceGroup = value;
    } else if (key === 'providers' && result.provider === undefined) {
      result.provider = value;
      const rest = segments.slice(i + 2);
      if (rest.length >= 2) {
        result.resourceType = `${value}/${rest[0]}`;
        result.name = rest[1];
      }
      break;
    }
  }

  return result;
}

export function resourceGroupFromResourceId(id: string): string | undefined {
  return parseResourceId(id).resourceGroup;
}

const PORTAL_BASE_URL = 'https://portal.azure.com';

export function resourceGroupPortalUrl(subscriptionId: string, resourceGroup: string): string {
  return `${PORTAL_BASE_URL}/#@/resource/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/overview`;
}

export function deploymentPortalUrl(deploymentId: string): string {
  return `${PORTAL_BASE_URL}/#view/HubsExtension/DeploymentDetailsBlade/~/overview/id/${encodeURIComponent(deploymentId)}`;
}

export function createNamingService(clock?: Clock): DeploymentNamingService {
  return new DeploymentNamingService(clock);
}
