/**
 * Pulumi stack settings for every project in a context, stored as
 * pulumi.yaml so that any machine can redeploy.
 */

import { PULUMI_CONFIG_FILENAME } from '../constants/config-files.js';
import type { Context } from '../context/context.js';
import type { BlobStore } from '../external/interfaces.js';
import { getLogger } from '../utils/logger.js';
import { DSHPulumiConfigSchema, type DSHPulumiConfigSettings, type PulumiProject } from './schema.js';
import { SerialisableConfig, downloadYaml, loadYaml, remoteExists } from './serialisable.js';

const TYPE_NAME = 'DSHPulumiConfig';

export class DSHPulumiConfig extends SerialisableConfig<DSHPulumiConfigSettings> {
  static readonly defaultFilename = PULUMI_CONFIG_FILENAME;

  constructor(settings: DSHPulumiConfigSettings = { encrypted_key: null, projects: {} }) {
    super(settings);
  }

  get filename(): string {
    return DSHPulumiConfig.defaultFilename;
  }

  get projectNames(): string[] {
    return Object.keys(this.settings.projects);
  }

  get encryptedKey(): string | null {
    return this.settings.encrypted_key;
  }

  set encryptedKey(value: string | null) {
    this.settings.encrypted_key = value;
  }

  project(name: string): PulumiProject | undefined {
    return this.settings.projects[name];
  }

  createOrSelectProject(name: string): PulumiProject {
    const existing = this.settings.projects[name];
    if (existing) return existing;
    getLogger().debug(`Creating Pulumi project settings for '${name}'.`);
    const project: PulumiProject = { stack_config: {} };
    this.settings.projects[name] = project;
    return project;
  }

  removeProject(name: string): void {
    delete this.settings.projects[name];
  }

  static fromYaml(text: string): DSHPulumiConfig {
    return new DSHPulumiConfig(loadYaml(TYPE_NAME, DSHPulumiConfigSchema, text));
  }

  static async fromRemote(context: Context, store: BlobStore): Promise<DSHPulumiConfig> {
    return DSHPulumiConfig.fromYaml(await downloadYaml(context, store, DSHPulumiConfig.defaultFilename));
  }

  /**
   * Load the remote settings, or start empty when none have been uploaded
   */
  static async fromRemoteOrCreate(context: Context, store: BlobStore): Promise<DSHPulumiConfig> {
    if (await DSHPulumiConfig.remoteExists(context, store)) {
      return DSHPulumiConfig.fromRemote(context, store);
    }
    return new DSHPulumiConfig();
  }

  static remoteExists(context: Context, store: BlobStore): Promise<boolean> {
    return remoteExists(context, store, DSHPulumiConfig.defaultFilename);
  }
}
