/**
 * SHM configuration, stored as shm.yaml in the context storage account.
 * Every field is required, so a config that loads is ready to deploy.
 */

import { SHM_CONFIG_FILENAME } from '../constants/config-files.js';
import type { Context } from '../context/context.js';
import type { BlobStore } from '../external/interfaces.js';
import { SHMConfigSchema, type AzureSection, type SHMConfigSettings, type SHMSection } from './schema.js';
import { SerialisableConfig, downloadYaml, dumpYaml, loadYaml, remoteExists } from './serialisable.js';

const TYPE_NAME = 'SHMConfig';

export class SHMConfig extends SerialisableConfig<SHMConfigSettings> {
  static readonly defaultFilename = SHM_CONFIG_FILENAME;

  constructor(settings: SHMConfigSettings) {
    super(settings);
  }

  get filename(): string {
    return SHMConfig.defaultFilename;
  }

  get azure(): AzureSection {
    return this.settings.azure;
  }

  get shm(): SHMSection {
    return this.settings.shm;
  }

  static fromYaml(text: string): SHMConfig {
    return new SHMConfig(loadYaml(TYPE_NAME, SHMConfigSchema, text));
  }

  static async fromRemote(context: Context, store: BlobStore): Promise<SHMConfig> {
    return SHMConfig.fromYaml(await downloadYaml(context, store, SHMConfig.defaultFilename));
  }

  static remoteExists(context: Context, store: BlobStore): Promise<boolean> {
    return remoteExists(context, store, SHMConfig.defaultFilename);
  }

  /**
   * YAML with a description in place of every value, for users to fill in
   */
  static template(): string {
    return dumpYaml({
      azure: {
        subscription_id: 'ID of the Azure subscription that the TRE will be deployed to',
        tenant_id: 'Home tenant for the Azure account used to deploy infrastructure: `az account show`',
      },
      shm: {
        entra_tenant_id: 'Tenant ID for the Entra ID used to manage TRE users',
        fqdn: 'Domain you want your users to belong to and where your TRE will be deployed',
      },
    });
  }
}
