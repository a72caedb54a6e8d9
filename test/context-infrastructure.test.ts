import type { KeyVaultKey } from '@azure/keyvault-keys';

import { Context } from '../src/context/context';
import type { KeyVaultAccess } from '../src/external/azure-api';
import type { AccountInformation } from '../src/external/credentials';
import { ContextInfrastructure, type ContextBackendApi } from '../src/infrastructure/context-infrastructure';
import { quietConsole } from './helpers';

const ADMIN_GROUP_ID = 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd';

class RecordingApi implements ContextBackendApi {
  readonly calls: string[] = [];
  keyVaultAccess: KeyVaultAccess | null = null;

  async accountInformation(): Promise<AccountInformation> {
    return { name: 'Test User', userId: 'user-1', tenantId: 'tenant-1', upn: null };
  }

  async ensureResourceGroup(name: string, location: string): Promise<void> {
    this.calls.push(`resource group ${name} in ${location}`);
  }

  async ensureStorageAccount(resourceGroupName: string, storageAccountName: string): Promise<void> {
    this.calls.push(`storage account ${storageAccountName} in ${resourceGroupName}`);
  }

  async ensureStorageBlobContainer(
    resourceGroupName: string,
    storageAccountName: string,
    containerName: string
  ): Promise<void> {
    this.calls.push(`container ${containerName} in ${storageAccountName}`);
  }

  async ensureKeyVault(
    resourceGroupName: string,
    keyVaultName: string,
    location: string,
    access: KeyVaultAccess
  ): Promise<void> {
    this.keyVaultAccess = access;
    this.calls.push(`key vault ${keyVaultName}`);
  }

  async ensureKeyVaultKey(keyVaultName: string, keyName: string): Promise<KeyVaultKey> {
    this.calls.push(`key ${keyName} in ${keyVaultName}`);
    return {
      name: keyName,
      properties: { name: keyName, vaultUrl: `https://${keyVaultName}.vault.azure.net`, version: 'v1' },
    };
  }

  async removeResourceGroup(name: string): Promise<void> {
    this.calls.push(`remove ${name}`);
  }
}

const context = new Context({
  admin_group_id: ADMIN_GROUP_ID,
  location: 'uksouth',
  name: 'Acme',
  subscription_name: 'Acme Subscription',
});

quietConsole();

describe('ContextInfrastructure', () => {
  test('creates the backend resources in order', async () => {
    const api = new RecordingApi();
    await new ContextInfrastructure(context, api).create();
    expect(api.calls).toEqual([
      'resource group shm-acme-rg-context in uksouth',
      'storage account shmacmecontext in shm-acme-rg-context',
      'container config in shmacmecontext',
      'container pulumi in shmacmecontext',
      'key vault shm-acme-kv-context',
      'key pulumi-encryption-key in shm-acme-kv-context',
    ]);
  });

  test('gives the admin group and the deploying user access to the key vault', async () => {
    const api = new RecordingApi();
    await new ContextInfrastructure(context, api).create();
    expect(api.keyVaultAccess).toEqual({ tenantId: 'tenant-1', adminObjectIds: [ADMIN_GROUP_ID, 'user-1'] });
  });

  test('tears down by removing the resource group', async () => {
    const api = new RecordingApi();
    await new ContextInfrastructure(context, api).teardown();
    expect(api.calls).toEqual(['remove shm-acme-rg-context']);
  });
});

