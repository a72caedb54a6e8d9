/**
 * Context
 *
 * One deployment target: an Azure subscription, a location and the Entra
 * group that administers it. Every backend resource name is derived from
 * the context name.
 */

import * as path from 'path';

import { configDir } from '../constants/config-files.js';
import type { ContextSettings } from '../config/schema.js';
import type { BlobLocation } from '../external/interfaces.js';
import { alphanumeric } from '../utils/naming.js';
import { getVersion } from '../utils/version.js';

export const PULUMI_ENCRYPTION_KEY_NAME = 'pulumi-encryption-key';

export class Context {
  constructor(readonly settings: ContextSettings) {}

  get name(): string {
    return this.settings.name;
  }

  get adminGroupId(): string {
    return this.settings.admin_group_id;
  }

  get location(): string {
    return this.settings.location;
  }

  get subscriptionName(): string {
    return this.settings.subscription_name;
  }

  /** Lowercase alphanumeric form of the name, used in resource names */
  get shmName(): string {
    return alphanumeric(this.name).toLowerCase();
  }

  get workDirectory(): string {
    return path.join(configDir(), this.shmName);
  }

  get resourceGroupName(): string {
    return `shm-${this.shmName}-rg-context`;
  }

  // Storage account names are limited to 24 characters
  get storageAccountName(): string {
    return `shm${this.shmName.slice(0, 14)}context`;
  }

  get storageContainerName(): string {
    return 'config';
  }

  get pulumiStorageContainerName(): string {
    return 'pulumi';
  }

  get pulumiBackendUrl(): string {
    return `azblob://${this.pulumiStorageContainerName}`;
  }

  // Key vault names are limited to 24 characters
  get keyVaultName(): string {
    return `shm-${this.shmName.slice(0, 9)}-kv-context`;
  }

  get pulumiEncryptionKeyName(): string {
    return PULUMI_ENCRYPTION_KEY_NAME;
  }

  pulumiSecretsProviderUrl(keyVersion: string): string {
    return `azurekeyvault://${this.keyVaultName}.vault.azure.net/keys/${this.pulumiEncryptionKeyName}/${keyVersion}`;
  }

  get configLocation(): BlobLocation {
    return {
      resourceGroupName: this.resourceGroupName,
      storageAccountName: this.storageAccountName,
      containerName: this.storageContainerName,
    };
  }

  get tags(): Record<string, string> {
    return {
      deployment: this.name,
      'deployed by': 'dsh',
      project: 'Data Safe Haven',
      version: getVersion(),
    };
  }
}
