/**
 * Azure API
 *
 * Resource Manager and data-plane calls used to manage the context
 * backend: resource groups, storage, key vaults and blobs.
 */

import type { TokenCredential } from '@azure/identity';
import { KeyVaultManagementClient } from '@azure/arm-keyvault';
import { ResourceManagementClient } from '@azure/arm-resources';
import { StorageManagementClient } from '@azure/arm-storage';
import { SubscriptionClient } from '@azure/arm-subscriptions';
import { KeyClient, type KeyVaultKey } from '@azure/keyvault-keys';
import { BlobServiceClient, StorageSharedKeyCredential, type ContainerClient } from '@azure/storage-blob';

import { DataSafeHavenAzureError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { AzureSdkCredential, type AccountInformation } from './credentials.js';
import type { BlobLocation, BlobStore } from './interfaces.js';

export interface KeyVaultAccess {
  tenantId: string;
  /** Object IDs (users or groups) that get full access */
  adminObjectIds: string[];
}

const KEY_PERMISSIONS = [
  'get',
  'list',
  'update',
  'create',
  'import',
  'delete',
  'recover',
  'backup',
  'restore',
  'decrypt',
  'encrypt',
  'unwrapKey',
  'wrapKey',
  'verify',
  'sign',
  'purge',
];
const SECRET_PERMISSIONS = ['get', 'list', 'set', 'delete', 'recover', 'backup', 'restore', 'purge'];
const CERTIFICATE_PERMISSIONS = ['get', 'list', 'update', 'create', 'import', 'delete', 'recover', 'purge'];

export class AzureApi implements BlobStore {
  readonly credential: AzureSdkCredential;
  private subscriptionId: string | null = null;
  private readonly storageKeys = new Map<string, string>();

  constructor(
    readonly subscriptionName: string,
    credential?: AzureSdkCredential
  ) {
    this.credential = credential ?? new AzureSdkCredential();
  }

  private async tokenCredential(): Promise<TokenCredential> {
    return this.credential.getCredential();
  }

  accountInformation(): Promise<AccountInformation> {
    return this.credential.accountInformation();
  }

  /**
   * Resolve the subscription ID for the subscription name
   */
  async getSubscriptionId(): Promise<string> {
    if (this.subscriptionId) return this.subscriptionId;
    const client = new SubscriptionClient(await this.tokenCredential());
    for await (const subscription of client.subscriptions.list()) {
      if (subscription.displayName === this.subscriptionName && subscription.subscriptionId) {
        this.subscriptionId = subscription.subscriptionId;
        return subscription.subscriptionId;
      }
    }
    throw new DataSafeHavenAzureError(`Could not find subscription '${this.subscriptionName}'.`);
  }

  private async resources(): Promise<ResourceManagementClient> {
    return new ResourceManagementClient(await this.tokenCredential(), await this.getSubscriptionId());
  }

  private async storage(): Promise<StorageManagementClient> {
    return new StorageManagementClient(await this.tokenCredential(), await this.getSubscriptionId());
  }

  private async keyVaults(): Promise<KeyVaultManagementClient> {
    return new KeyVaultManagementClient(await this.tokenCredential(), await this.getSubscriptionId());
  }

  // ============================================================
  // Resource groups
  // ============================================================

  async ensureResourceGroup(name: string, location: string, tags: Record<string, string>): Promise<void> {
    try {
      const client = await this.resources();
      await client.resourceGroups.createOrUpdate(name, { location, tags });
      getLogger().info(`Ensured that resource group '${name}' exists in '${location}'.`);
    } catch (e) {
      throw new DataSafeHavenAzureError(`Failed to create resource group '${name}'.`, { cause: e });
    }
  }

  async resourceGroupExists(name: string): Promise<boolean> {
    const client = await this.resources();
    const result = await client.resourceGroups.checkExistence(name);
    return result.body;
  }

  async removeResourceGroup(name: string): Promise<void> {
    try {
      if (!(await this.resourceGroupExists(name))) {
        getLogger().warning(`Resource group '${name}' does not exist.`);
        return;
      }
      getLogger().info(`Removing resource group '${name}'. This may take some time.`);
      const client = await this.resources();
      await client.resourceGroups.beginDeleteAndWait(name);
      getLogger().info(`Removed resource group '${name}'.`);
    } catch (e) {
      throw new DataSafeHavenAzureError(`Failed to remove resource group '${name}'.`, { cause: e });
    }
  }

  // ============================================================
  // Storage
  // ============================================================

  async ensureStorageAccount(
    resourceGroupName: string,
    storageAccountName: string,
    location: string,
    tags: Record<string, string>
  ): Promise<void> {
    try {
      const client = await this.storage();
      await client.storageAccounts.beginCreateAndWait(resourceGroupName, storageAccountName, {
        location,
        tags,
        kind: 'StorageV2',
        sku: { name: 'Standard_LRS' },
        allowBlobPublicAccess: false,
        minimumTlsVersion: 'TLS1_2',
      });
      getLogger().info(`Ensured that storage account '${storageAccountName}' exists.`);
    } catch (e) {
      throw new DataSafeHavenAzureError(`Failed to create storage account '${storageAccountName}'.`, {
        cause: e,
      });
    }
  }

  async ensureStorageBlobContainer(
    resourceGroupName: string,
    storageAccountName: string,
    containerName: string
  ): Promise<void> {
    try {
      const client = await this.storage();
      await client.blobContainers.create(resourceGroupName, storageAccountName, containerName, {
        publicAccess: 'None',
      });
      getLogger().info(`Ensured that storage container '${containerName}' exists.`);
    } catch (e) {
      throw new DataSafeHavenAzureError(`Failed to create storage container '${containerName}'.`, {
        cause: e,
      });
    }
  }

  async getStorageAccountKey(resourceGroupName: string, storageAccountName: string): Promise<string> {
    const cached = this.storageKeys.get(storageAccountName);
    if (cached) return cached;
    try {
      const client = await this.storage();
      const result = await client.storageAccounts.listKeys(resourceGroupName, storageAccountName);
      const key = result.keys?.find((k) => k.value)?.value;
      if (!key) {
        throw new Error('No keys were returned.');
      }
      this.storageKeys.set(storageAccountName, key);
      return key;
    } catch (e) {
      throw new DataSafeHavenAzureError(`Could not load key values for storage account '${storageAccountName}'.`, {
        cause: e,
      });
    }
  }

  private async containerClient(location: BlobLocation): Promise<ContainerClient> {
    const key = await this.getStorageAccountKey(location.resourceGroupName, location.storageAccountName);
    const service = new BlobServiceClient(
      `https://${location.storageAccountName}.blob.core.windows.net`,
      new StorageSharedKeyCredential(location.storageAccountName, key)
    );
    return service.getContainerClient(location.containerName);
  }

  async uploadBlob(content: string, blobName: string, location: BlobLocation): Promise<void> {
    try {
      const container = await this.containerClient(location);
      await container.getBlockBlobClient(blobName).upload(content, Buffer.byteLength(content));
      getLogger().debug(`Uploaded file '${blobName}' to blob storage.`);
    } catch (e) {
      throw new DataSafeHavenAzureError(`Blob file '${blobName}' could not be uploaded to '${location.storageAccountName}'.`, {
        cause: e,
      });
    }
  }

  async downloadBlob(blobName: string, location: BlobLocation): Promise<string> {
    try {
      const container = await this.containerClient(location);
      const buffer = await container.getBlobClient(blobName).downloadToBuffer();
      getLogger().debug(`Downloaded file '${blobName}' from blob storage.`);
      return buffer.toString('utf8');
    } catch (e) {
      throw new DataSafeHavenAzureError(
        `Blob file '${blobName}' could not be downloaded from '${location.storageAccountName}'.\n${errorMessage(e)}`,
        { cause: e }
      );
    }
  }

  async blobExists(blobName: string, location: BlobLocation): Promise<boolean> {
    if (!(await this.resourceGroupExists(location.resourceGroupName))) {
      return false;
    }
    const container = await this.containerClient(location);
    const exists = await container.getBlobClient(blobName).exists();
    getLogger().debug(`File '${blobName}' ${exists ? 'exists' : 'does not exist'} in blob storage.`);
    return exists;
  }

  async removeBlob(blobName: string, location: BlobLocation): Promise<void> {
    try {
      const container = await this.containerClient(location);
      await container.getBlobClient(blobName).deleteIfExists();
      getLogger().info(`Removed file '${blobName}' from blob storage.`);
    } catch (e) {
      throw new DataSafeHavenAzureError(`Blob file '${blobName}' could not be removed.`, { cause: e });
    }
  }

  // ============================================================
  // Key vaults
  // ============================================================

  async ensureKeyVault(
    resourceGroupName: string,
    keyVaultName: string,
    location: string,
    access: KeyVaultAccess,
    tags: Record<string, string>
  ): Promise<void> {
    try {
      const client = await this.keyVaults();
      await client.vaults.beginCreateOrUpdateAndWait(resourceGroupName, keyVaultName, {
        location,
        tags,
        properties: {
          tenantId: access.tenantId,
          sku: { family: 'A', name: 'standard' },
          enableSoftDelete: true,
          softDeleteRetentionInDays: 7,
          accessPolicies: access.adminObjectIds.map((objectId) => ({
            tenantId: access.tenantId,
            objectId,
            permissions: {
              keys: KEY_PERMISSIONS,
              secrets: SECRET_PERMISSIONS,
              certificates: CERTIFICATE_PERMISSIONS,
            },
          })),
        },
      });
      getLogger().info(`Ensured that key vault '${keyVaultName}' exists.`);
    } catch (e) {
      throw new DataSafeHavenAzureError(`Failed to create key vault '${keyVaultName}'.`, { cause: e });
    }
  }

  /**
   * Return the named RSA key, creating it if needed
   */
  async ensureKeyVaultKey(keyVaultName: string, keyName: string): Promise<KeyVaultKey> {
    const client = new KeyClient(`https://${keyVaultName}.vault.azure.net`, await this.tokenCredential());
    try {
      return await client.getKey(keyName);
    } catch (e) {
      getLogger().debug(`Key '${keyName}' not found, creating it: ${errorMessage(e)}`);
    }
    try {
      const key = await client.createRsaKey(keyName, { keySize: 2048 });
      getLogger().info(`Ensured that key '${keyName}' exists in key vault '${keyVaultName}'.`);
      return key;
    } catch (e) {
      throw new DataSafeHavenAzureError(`Failed to create key '${keyName}' in key vault '${keyVaultName}'.`, {
        cause: e,
      });
    }
  }
}
