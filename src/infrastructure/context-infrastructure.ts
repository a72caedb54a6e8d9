/**
 * Context Infrastructure
 *
 * The backend every other deployment in a context depends on: a storage
 * account holding configuration and Pulumi state, and a key vault holding
 * the key that encrypts Pulumi secrets.
 */

import type { Context } from '../context/context.js';
import type { AzureApi } from '../external/azure-api.js';
import { getLogger } from '../utils/logger.js';

export type ContextBackendApi = Pick<
  AzureApi,
  | 'accountInformation'
  | 'ensureResourceGroup'
  | 'ensureStorageAccount'
  | 'ensureStorageBlobContainer'
  | 'ensureKeyVault'
  | 'ensureKeyVaultKey'
  | 'removeResourceGroup'
>;

export class ContextInfrastructure {
  constructor(
    readonly context: Context,
    private readonly azureApi: ContextBackendApi
  ) {}

  /**
   * Create or update every backend resource; safe to repeat
   */
  async create(): Promise<void> {
    const { context } = this;
    const account = await this.azureApi.accountInformation();
    getLogger().info(`Creating context backend for '${context.name}' as '${account.name}'.`);

    await this.azureApi.ensureResourceGroup(context.resourceGroupName, context.location, context.tags);
    await this.azureApi.ensureStorageAccount(
      context.resourceGroupName,
      context.storageAccountName,
      context.location,
      context.tags
    );
    for (const container of [context.storageContainerName, context.pulumiStorageContainerName]) {
      await this.azureApi.ensureStorageBlobContainer(context.resourceGroupName, context.storageAccountName, container);
    }
    await this.azureApi.ensureKeyVault(
      context.resourceGroupName,
      context.keyVaultName,
      context.location,
      { tenantId: account.tenantId, adminObjectIds: [context.adminGroupId, account.userId] },
      context.tags
    );
    await this.azureApi.ensureKeyVaultKey(context.keyVaultName, context.pulumiEncryptionKeyName);
  }

  async teardown(): Promise<void> {
    await this.azureApi.removeResourceGroup(this.context.resourceGroupName);
  }
}
