/**
 * Shared plumbing for CLI commands: loading the selected context, building
 * Azure clients and Pulumi project managers, and wrapping failures.
 */

import type { PulumiFn } from '@pulumi/pulumi/automation';

import type { DSHPulumiConfig } from '../config/pulumi-config.js';
import type { Context } from '../context/context.js';
import { ContextManager } from '../context/context-manager.js';
import { AzureApi } from '../external/azure-api.js';
import { ProjectManager } from '../infrastructure/project-manager.js';
import { DataSafeHavenAzureError, DataSafeHavenError, errorMessage } from '../utils/errors.js';
import type { TextFetcher } from '../utils/network.js';

/**
 * Clients that commands use to reach Azure and the IP lookup service
 */
export interface CommandServices {
  azureApiFor(context: Context): AzureApi;
  fetcher: TextFetcher;
}

export const defaultServices: CommandServices = {
  azureApiFor: (context) => new AzureApi(context.subscriptionName),
  fetcher: (url) => fetch(url),
};

export function selectedContext(): Context {
  return ContextManager.fromFile().assertContext();
}

/**
 * Run a command body, prefixing any DataSafeHavenError with what was being attempted
 */
export async function withErrorContext<T>(message: string, body: () => Promise<T>): Promise<T> {
  try {
    return await body();
  } catch (e) {
    if (e instanceof DataSafeHavenError) {
      throw new DataSafeHavenError(`${message}\n${e.message}`, { cause: e });
    }
    throw e;
  }
}

export function requireProject(pulumiConfig: DSHPulumiConfig, projectName: string, component: 'SHM' | 'SRE'): void {
  if (!pulumiConfig.projectNames.includes(projectName)) {
    throw new DataSafeHavenError(`No Pulumi project for '${projectName}'.\nHave you deployed the ${component}?`);
  }
}

export interface ProjectManagerRequest {
  context: Context;
  azureApi: AzureApi;
  pulumiConfig: DSHPulumiConfig;
  projectName: string;
  stackName: string;
  program: PulumiFn;
}

/**
 * Project manager wired to the context's state storage and encryption key
 */
export async function projectManagerFor(request: ProjectManagerRequest): Promise<ProjectManager> {
  const { context, azureApi } = request;
  const key = await azureApi.ensureKeyVaultKey(context.keyVaultName, context.pulumiEncryptionKeyName);
  const version = key.properties.version;
  if (!version) {
    throw new DataSafeHavenAzureError(`Key '${context.pulumiEncryptionKeyName}' has no version.`);
  }
  let storageAccountKey: string;
  try {
    storageAccountKey = await azureApi.getStorageAccountKey(context.resourceGroupName, context.storageAccountName);
  } catch (e) {
    throw new DataSafeHavenAzureError(
      `Could not access the backend for context '${context.name}'. Have you run 'dsh context create'?\n${errorMessage(e)}`,
      { cause: e }
    );
  }
  return new ProjectManager({
    context,
    pulumiConfig: request.pulumiConfig,
    store: azureApi,
    projectName: request.projectName,
    stackName: request.stackName,
    program: request.program,
    encryptionKeyVersion: version,
    storageAccountKey,
  });
}
