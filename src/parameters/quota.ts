import { ConfigurationError, describeError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { ControlPlane } from '../provisioning/types.js';

export interface UsageRequirement {
  usageName: string;
  capacity: number;
}

/**
 * Parses `"<usage name>"` or `"<usage name>, <capacity>"`; capacity defaults to 1.
 */
export function parseUsageRequirement(text: string): UsageRequirement {
  const usage = text.trim();
  if (!usage) {
    throw new ConfigurationError('Empty usage name in quota requirement');
  }

  const parts = usage.split(',');
  if (parts.length === 1) {
    return { usageName: usage, capacity: 1 };
  }
  if (parts.length !== 2) {
    throw new ConfigurationError(`Invalid usage name format '${usage}'`);
  }

  const capacity = Number(parts[1].trim());
  if (!Number.isFinite(capacity) || parts[1].trim() === '') {
    throw new ConfigurationError(`Invalid capacity '${parts[1].trim()}' in quota requirement '${usage}'`);
  }
  if (capacity <= 0) {
    throw new ConfigurationError(`Invalid capacity '${capacity}' in quota requirement '${usage}': must be greater than 0`);
  }
  return { usageName: parts[0].trim(), capacity };
}

export type QuotaServices = Pick<ControlPlane, 'listAiUsages'>;

/**
 * Keeps the locations whose remaining quota covers every requirement.
 * A location whose usage cannot be read is logged and left out.
 */
export async function locationsWithQuota(
  services: QuotaServices,
  subscriptionId: string,
  locations: readonly string[],
  requirements: readonly string[],
  logger?: Logger
): Promise<string[]> {
  const parsed = requirements.map(parseUsageRequirement);
  const results: string[] = [];

  for (const location of locations) {
    let usages;
    try {
      usages = await services.listAiUsages(subscriptionId, location);
    } catch (error) {
      logger?.debug(`Skipping ${location}: reading usage failed: ${describeError(error)}`);
      continue;
    }

    const satisfied = parsed.every(requirement =>
      usages.some(usage => usage.name === requirement.usageName && usage.limit - usage.currentValue >= requirement.capacity)
    );
    if (satisfied) {
      results.push(location);
    }
  }

  if (results.length === 0) {
    const formatted = parsed.map(requirement => `${requirement.usageName} (capacity ${requirement.capacity})`);
    throw new ConfigurationError(`No location found with enough quota for ${formatted.join(', ')}`, {
      remediation: 'Request a quota increase or lower the capacity the template asks for'
    });
  }

  return results;
}
