/**
 * Project Manager
 *
 * Drives one Pulumi program through the Automation API. State lives in the
 * context's blob container, secrets are encrypted with the context key and
 * stack settings are round-tripped through pulumi.yaml so that any machine
 * with access to the context can redeploy.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LocalWorkspace, type PulumiFn, type Stack } from '@pulumi/pulumi/automation';

import type { DSHPulumiConfig } from '../config/pulumi-config.js';
import type { Context } from '../context/context.js';
import type { BlobStore } from '../external/interfaces.js';
import { DataSafeHavenPulumiError, errorMessage } from '../utils/errors.js';
import { fromAnsi, getLogger } from '../utils/logger.js';

export interface ProjectManagerOptions {
  context: Context;
  pulumiConfig: DSHPulumiConfig;
  store: BlobStore;
  projectName: string;
  stackName: string;
  program: PulumiFn;
  /** Version of the context key that encrypts stack secrets */
  encryptionKeyVersion: string;
  /** Credentials for the azblob backend */
  storageAccountKey: string;
}

export class ProjectManager {
  private stack: Stack | null = null;

  constructor(private readonly options: ProjectManagerOptions) {}

  get projectName(): string {
    return this.options.projectName;
  }

  get stackName(): string {
    return this.options.stackName;
  }

  get workDirectory(): string {
    return path.join(this.options.context.workDirectory, this.options.projectName);
  }

  private get envVars(): Record<string, string> {
    const { context, storageAccountKey } = this.options;
    return {
      AZURE_STORAGE_ACCOUNT: context.storageAccountName,
      AZURE_STORAGE_KEY: storageAccountKey,
      AZURE_KEYVAULT_AUTH_VIA_CLI: 'true',
    };
  }

  /**
   * Select the stack, creating it from the persisted settings if needed
   */
  async getStack(): Promise<Stack> {
    if (this.stack) return this.stack;
    const { context, pulumiConfig, projectName, stackName, program } = this.options;
    const project = pulumiConfig.createOrSelectProject(projectName);
    const secretsProvider = context.pulumiSecretsProviderUrl(this.options.encryptionKeyVersion);

    fs.mkdirSync(this.workDirectory, { recursive: true });
    try {
      this.stack = await LocalWorkspace.createOrSelectStack(
        { stackName, projectName, program },
        {
          workDir: this.workDirectory,
          projectSettings: {
            name: projectName,
            runtime: 'nodejs',
            backend: { url: context.pulumiBackendUrl },
          },
          secretsProvider,
          stackSettings: {
            [stackName]: {
              secretsProvider,
              encryptedKey: pulumiConfig.encryptedKey ?? undefined,
              config: project.stack_config,
            },
          },
          envVars: this.envVars,
        }
      );
    } catch (e) {
      throw new DataSafeHavenPulumiError(`Could not load Pulumi stack '${stackName}'.\n${errorMessage(e)}`, {
        cause: e,
      });
    }
    getLogger().debug(`Loaded Pulumi stack '${stackName}' from '${this.workDirectory}'.`);
    return this.stack;
  }

  private async setConfig(name: string, value: string, secret: boolean, replace: boolean): Promise<void> {
    const stack = await this.getStack();
    const existing = await stack.getAllConfig();
    if (!replace && `${this.projectName}:${name}` in existing) {
      getLogger().debug(`Keeping existing Pulumi config value for '${name}'.`);
      return;
    }
    await stack.setConfig(name, { value, secret });
  }

  /**
   * Set a plain stack config value, keeping any existing value unless replace is set
   */
  addOption(name: string, value: string, replace = false): Promise<void> {
    return this.setConfig(name, value, false, replace);
  }

  addSecret(name: string, value: string, replace = false): Promise<void> {
    return this.setConfig(name, value, true, replace);
  }

  /**
   * Run `pulumi up`, then persist the stack settings
   */
  async deploy(): Promise<void> {
    const stack = await this.getStack();
    const logger = getLogger();
    logger.info(`Deploying Pulumi stack '${this.stackName}'.`);
    try {
      await stack.refresh({ onOutput: (line) => logger.debug(line.trimEnd()) });
      await stack.up({ onOutput: (line) => fromAnsi(logger, line.trimEnd()) });
    } catch (e) {
      throw new DataSafeHavenPulumiError(`Pulumi deployment of '${this.stackName}' failed.\n${errorMessage(e)}`, {
        cause: e,
      });
    }
    await this.persistSettings();
  }

  /**
   * Run `pulumi destroy`, remove the stack and forget its settings
   */
  async teardown(): Promise<void> {
    const stack = await this.getStack();
    const logger = getLogger();
    logger.info(`Tearing down Pulumi stack '${this.stackName}'.`);
    try {
      await stack.destroy({ onOutput: (line) => fromAnsi(logger, line.trimEnd()) });
      await stack.workspace.removeStack(this.stackName);
    } catch (e) {
      throw new DataSafeHavenPulumiError(`Pulumi teardown of '${this.stackName}' failed.\n${errorMessage(e)}`, {
        cause: e,
      });
    }
    this.stack = null;
    const { context, pulumiConfig, store } = this.options;
    pulumiConfig.removeProject(this.projectName);
    await pulumiConfig.upload(context, store);
  }

  async output(name: string): Promise<unknown> {
    const stack = await this.getStack();
    const outputs = await stack.outputs();
    return outputs[name]?.value;
  }

  private async persistSettings(): Promise<void> {
    const { context, pulumiConfig, store } = this.options;
    const stack = await this.getStack();
    const settings = await stack.workspace.stackSettings(this.stackName);
    const project = pulumiConfig.createOrSelectProject(this.projectName);
    project.stack_config = { ...(settings.config ?? {}) };
    if (settings.encryptedKey) {
      pulumiConfig.encryptedKey = settings.encryptedKey;
    }
    await pulumiConfig.upload(context, store);
    getLogger().debug(`Saved stack settings for '${this.stackName}' to '${pulumiConfig.filename}'.`);
  }
}
