import { ApiManagementClient } from '@azure/arm-apimanagement';
import { AppConfigurationManagementClient } from '@azure/arm-appconfiguration';
import { CognitiveServicesManagementClient } from '@azure/arm-cognitiveservices';
import type { TokenCredential } from '@azure/identity';
import { KeyVaultManagementClient } from '@azure/arm-keyvault';
import { ResourceNotFoundError } from '../errors/index.js';
import type { PurgeableResourceType, PurgeCandidate } from '../types/index.js';
import { callAzure } from './azure-errors.js';
import type { OperationOptions, QuotaUsage, SoftDeleteState } from './types.js';

/** One management client per subscription, created on first use */
class ClientCache<T> {
  private readonly clients = new Map<string, T>();

  constructor(private readonly create: (subscriptionId: string) => T) {}

  get(subscriptionId: string): T {
    let client = this.clients.get(subscriptionId);
    if (!client) {
      client = this.create(subscriptionId);
      this.clients.set(subscriptionId, client);
    }
    return client;
  }
}

/**
 * Soft-delete inspection and purge for the resource types that keep deleted instances
 * around: Key Vault vaults and managed HSMs, App Configuration stores, API Management
 * services and Cognitive Services accounts.
 */
export class AzurePurgeServices {
  private readonly keyVault: ClientCache<KeyVaultManagementClient>;
  private readonly appConfiguration: ClientCache<AppConfigurationManagementClient>;
  private readonly apiManagement: ClientCache<ApiManagementClient>;
  private readonly cognitiveServices: ClientCache<CognitiveServicesManagementClient>;

  constructor(credential: TokenCredential) {
    this.keyVault = new ClientCache(subscriptionId => new KeyVaultManagementClient(credential, subscriptionId));
    this.appConfiguration = new ClientCache(
      subscriptionId => new AppConfigurationManagementClient(credential, subscriptionId)
    );
    this.apiManagement = new ClientCache(subscriptionId => new ApiManagementClient(credential, subscriptionId));
    this.cognitiveServices = new ClientCache(
      subscriptionId => new CognitiveServicesManagementClient(credential, subscriptionId)
    );
  }

  async getSoftDeleteState(
    subscriptionId: string,
    resourceType: PurgeableResourceType,
    resourceGroup: string,
    name: string
  ): Promise<SoftDeleteState> {
    return callAzure(() => this.readSoftDeleteState(subscriptionId, resourceType, resourceGroup, name), {
      notFound: cause => new ResourceNotFoundError(`${resourceType} ${name}`, cause)
    });
  }

  async purge(subscriptionId: string, candidate: PurgeCandidate, options: OperationOptions = {}): Promise<void> {
    await callAzure(() => this.purgeDeleted(subscriptionId, candidate, { abortSignal: options.signal }), {
      signal: options.signal,
      cancelled: `Purge of ${candidate.name} was cancelled`
    });
  }

  private async purgeDeleted(
    subscriptionId: string,
    candidate: PurgeCandidate,
    sdkOptions: { abortSignal?: AbortSignal }
  ): Promise<void> {
    const { name, location, resourceGroup } = candidate;
    switch (candidate.resourceType) {
      case 'Microsoft.KeyVault/vaults':
        await this.keyVault.get(subscriptionId).vaults.beginPurgeDeletedAndWait(name, location, sdkOptions);
        return;
      case 'Microsoft.KeyVault/managedHSMs':
        await this.keyVault.get(subscriptionId).managedHsms.beginPurgeDeletedAndWait(name, location, sdkOptions);
        return;
      case 'Microsoft.AppConfiguration/configurationStores':
        await this.appConfiguration.get(subscriptionId).configurationStores.beginPurgeDeletedAndWait(location, name, sdkOptions);
        return;
      case 'Microsoft.ApiManagement/service':
        await this.apiManagement.get(subscriptionId).deletedServices.beginPurgeAndWait(name, location, sdkOptions);
        return;
      case 'Microsoft.CognitiveServices/accounts':
        await this.cognitiveServices
          .get(subscriptionId)
          .deletedAccounts.beginPurgeAndWait(location, resourceGroup, name, sdkOptions);
        return;
    }
  }

  /** Cognitive Services quota usage in one location */
  async listAiUsages(subscriptionId: string, location: string): Promise<QuotaUsage[]> {
    const usages: QuotaUsage[] = [];
    for await (const usage of this.cognitiveServices.get(subscriptionId).usages.list(location)) {
      if (usage.name?.value) {
        usages.push({ name: usage.name.value, limit: usage.limit ?? 0, currentValue: usage.currentValue ?? 0 });
      }
    }
    return usages;
  }

  private async readSoftDeleteState(
    subscriptionId: string,
    resourceType: PurgeableResourceType,
    resourceGroup: string,
    name: string
  ): Promise<SoftDeleteState> {
    switch (resourceType) {
      case 'Microsoft.KeyVault/vaults': {
        const vault = await this.keyVault.get(subscriptionId).vaults.get(resourceGroup, name);
        return {
          location: vault.location ?? '',
          softDeleteEnabled: vault.properties.enableSoftDelete === true,
          purgeProtectionEnabled: vault.properties.enablePurgeProtection === true
        };
      }
      case 'Microsoft.KeyVault/managedHSMs': {
        const hsm = await this.keyVault.get(subscriptionId).managedHsms.get(resourceGroup, name);
        return {
          location: hsm.location ?? '',
          softDeleteEnabled: hsm.properties?.enableSoftDelete === true,
          purgeProtectionEnabled: hsm.properties?.enablePurgeProtection === true
        };
      }
      case 'Microsoft.AppConfiguration/configurationStores': {
        const store = await this.appConfiguration.get(subscriptionId).configurationStores.get(resourceGroup, name);
        // An unset retention means the service default, which keeps deleted stores
        const retention = store.softDeleteRetentionInDays;
        return {
          location: store.location,
          softDeleteEnabled: retention === undefined || retention > 0,
          purgeProtectionEnabled: store.enablePurgeProtection === true
        };
      }
      case 'Microsoft.ApiManagement/service': {
        const service = await this.apiManagement.get(subscriptionId).apiManagementService.get(resourceGroup, name);
        return { location: service.location, softDeleteEnabled: true, purgeProtectionEnabled: false };
      }
      case 'Microsoft.CognitiveServices/accounts': {
        const account = await this.cognitiveServices.get(subscriptionId).accounts.get(resourceGroup, name);
        return {
          location: account.location ?? '',
          kind: account.kind,
          softDeleteEnabled: true,
          purgeProtectionEnabled: false
        };
      }
    }
  }
}
