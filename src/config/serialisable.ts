/**
 * Serialisable Config
 *
 * YAML loading and saving shared by every configuration type, and
 * transfer of that YAML to and from the context storage account.
 */

import yaml from 'js-yaml';
import type { z } from 'zod';

import type { Context } from '../context/context.js';
import type { BlobStore } from '../external/interfaces.js';
import { DataSafeHavenConfigError, DataSafeHavenParameterError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Parse YAML that must hold a mapping at the top level
 */
export function parseYamlMapping(typeName: string, text: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new DataSafeHavenConfigError(`Could not parse ${typeName} configuration as YAML.`, { cause: e });
  }
  if (!isMapping(raw)) {
    throw new DataSafeHavenConfigError(`Unable to parse ${typeName} configuration as a dict.`);
  }
  return raw;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate YAML against a schema
 */
export function loadYaml<T extends z.ZodTypeAny>(typeName: string, schema: T, text: string): z.output<T> {
  const parsed = schema.safeParse(parseYamlMapping(typeName, text));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new DataSafeHavenParameterError(
      `Could not load ${typeName} configuration.\n${details.join('\n')}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

export function dumpYaml(value: object): string {
  return yaml.dump(value, { noRefs: true, lineWidth: -1 });
}

export async function downloadYaml(context: Context, store: BlobStore, filename: string): Promise<string> {
  getLogger().debug(`Downloading '${filename}' from storage account '${context.storageAccountName}'.`);
  return store.downloadBlob(filename, context.configLocation);
}

export abstract class SerialisableConfig<S extends object> {
  protected constructor(readonly settings: S) {}

  /** Blob name in the context storage container */
  abstract get filename(): string;

  toYaml(): string {
    return dumpYaml(this.settings);
  }

  async upload(context: Context, store: BlobStore): Promise<void> {
    await store.uploadBlob(this.toYaml(), this.filename, context.configLocation);
    getLogger().debug(`Uploaded '${this.filename}' to storage account '${context.storageAccountName}'.`);
  }

  async removeRemote(context: Context, store: BlobStore): Promise<void> {
    await store.removeBlob(this.filename, context.configLocation);
  }
}

export async function remoteExists(context: Context, store: BlobStore, filename: string): Promise<boolean> {
  return store.blobExists(filename, context.configLocation);
}
