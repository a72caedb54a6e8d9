/**
 * Config file names and locations used across the CLI.
 * Single source of truth for local and remote file names.
 */

import * as os from 'os';
import * as path from 'path';

/** Local list of contexts (per-user, never uploaded) */
export const CONTEXTS_FILENAME = 'contexts.yaml';

/** Remote SHM configuration, stored in the context's config container */
export const SHM_CONFIG_FILENAME = 'shm.yaml';

/** Remote Pulumi stack settings for every project in a context */
export const PULUMI_CONFIG_FILENAME = 'pulumi.yaml';

/** Directory name used under the platform config and state roots */
export const APP_DIRECTORY_NAME = 'data_safe_haven';

export const CONFIG_DIRECTORY_ENV = 'DSH_CONFIG_DIRECTORY';
export const LOG_DIRECTORY_ENV = 'DSH_LOG_DIRECTORY';

/**
 * Directory holding contexts.yaml and per-context Pulumi workspaces.
 * DSH_CONFIG_DIRECTORY wins, then XDG_CONFIG_HOME, then ~/.config.
 */
export function configDir(): string {
  const override = process.env[CONFIG_DIRECTORY_ENV];
  if (override) return path.resolve(override);
  const root = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config');
  return path.join(root, APP_DIRECTORY_NAME);
}

/**
 * Directory holding daily log files.
 * DSH_LOG_DIRECTORY wins, then XDG_STATE_HOME, then ~/.local/state.
 */
export function logDir(): string {
  const override = process.env[LOG_DIRECTORY_ENV];
  if (override) return path.resolve(override);
  const root = process.env.XDG_STATE_HOME ?? path.join(os.homedir(), '.local', 'state');
  return path.join(root, APP_DIRECTORY_NAME);
}

/**
 * Resolve path to the contexts file, defaulting to the config directory.
 */
export function getContextsPath(configFilePath?: string): string {
  return configFilePath ?? path.join(configDir(), CONTEXTS_FILENAME);
}
