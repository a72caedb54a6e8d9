/**
 * SRE configuration, one sre-<name>.yaml per SRE in the context storage account
 */

import type { Context } from '../context/context.js';
import type { BlobStore } from '../external/interfaces.js';
import { sanitiseSreName } from '../utils/naming.js';
import { SREConfigSchema, type AzureSection, type SREConfigSettings, type SRESection } from './schema.js';
import { SerialisableConfig, downloadYaml, dumpYaml, loadYaml, remoteExists } from './serialisable.js';

const TYPE_NAME = 'SREConfig';

export class SREConfig extends SerialisableConfig<SREConfigSettings> {
  constructor(settings: SREConfigSettings) {
    super(settings);
  }

  static filenameFromName(sreName: string): string {
    return `sre-${sanitiseSreName(sreName)}.yaml`;
  }

  get filename(): string {
    return SREConfig.filenameFromName(this.name);
  }

  get name(): string {
    return this.settings.name;
  }

  get description(): string {
    return this.settings.description;
  }

  get azure(): AzureSection {
    return this.settings.azure;
  }

  get sre(): SRESection {
    return this.settings.sre;
  }

  /**
   * Deployable once it validates and administrators can reach it
   */
  isComplete(): boolean {
    return SREConfigSchema.safeParse(this.settings).success && this.sre.admin_ip_addresses.length > 0;
  }

  static fromYaml(text: string): SREConfig {
    return new SREConfig(loadYaml(TYPE_NAME, SREConfigSchema, text));
  }

  static async fromRemote(context: Context, store: BlobStore, sreName: string): Promise<SREConfig> {
    return SREConfig.fromYaml(await downloadYaml(context, store, SREConfig.filenameFromName(sreName)));
  }

  static remoteExists(context: Context, store: BlobStore, sreName: string): Promise<boolean> {
    return remoteExists(context, store, SREConfig.filenameFromName(sreName));
  }

  static template(): string {
    return dumpYaml({
      azure: {
        subscription_id: 'ID of the Azure subscription that the SRE will be deployed to',
        tenant_id: 'Home tenant for the Azure account used to deploy infrastructure: `az account show`',
      },
      description: 'Human-friendly name for this SRE deployment',
      name: 'A name for this config which consists only of letters, numbers, spaces and hyphens',
      sre: {
        admin_email_address: 'Email address shared by all administrators',
        admin_ip_addresses: ['List of IP addresses belonging to administrators'],
        databases: ['List of database systems to deploy'],
        data_provider_ip_addresses: ['List of IP addresses belonging to data providers'],
        remote_desktop: {
          allow_copy: 'True/False: whether to allow copying text out of the environment',
          allow_paste: 'True/False: whether to allow pasting text into the environment',
        },
        research_user_ip_addresses: ['List of IP addresses belonging to users'],
        software_packages: 'any/pre-approved/none: which packages from external repositories to allow',
        timezone: 'Timezone in IANA format (eg. Europe/London)',
        workspace_skus: ['List of Azure VM SKUs that will be used for data analysis.'],
      },
    });
  }
}
