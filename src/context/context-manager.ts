/**
 * Context Manager
 *
 * The local contexts.yaml file: every known context plus the one that
 * commands act on.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';

import { getContextsPath } from '../constants/config-files.js';
import { ContextManagerSchema, ContextSchema, type ContextSettings } from '../config/schema.js';
import { parseYamlMapping } from '../config/serialisable.js';
import { DataSafeHavenConfigError, DataSafeHavenParameterError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { Context } from './context.js';

const TYPE_NAME = 'ContextManager';

export class ContextManager {
  private selectedKey: string | null = null;
  private readonly contexts = new Map<string, Context>();

  constructor(contexts: Record<string, ContextSettings> = {}, selected: string | null = null) {
    for (const [key, settings] of Object.entries(contexts)) {
      this.contexts.set(key, new Context(settings));
    }
    this.assertDefined(selected);
    this.selectedKey = selected;
  }

  static fromYaml(text: string): ContextManager {
    const raw = parseYamlMapping(TYPE_NAME, text);
    const parsed = ContextManagerSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataSafeHavenParameterError(`Could not load ${TYPE_NAME} configuration.`, {
        cause: parsed.error,
      });
    }
    return new ContextManager(parsed.data.contexts, parsed.data.selected);
  }

  static fromFile(configFilePath: string = getContextsPath()): ContextManager {
    getLogger().debug(`Reading project settings from '${configFilePath}'.`);
    if (!fs.existsSync(configFilePath)) {
      throw new DataSafeHavenConfigError(`Could not find file ${configFilePath}.`);
    }
    return ContextManager.fromYaml(fs.readFileSync(configFilePath, 'utf8'));
  }

  get selected(): string | null {
    return this.selectedKey;
  }

  set selected(key: string | null) {
    this.assertDefined(key);
    this.selectedKey = key;
    getLogger().info(key === null ? 'Cleared selected context.' : `Switched context to '${key}'.`);
  }

  private assertDefined(key: string | null): void {
    if (key !== null && !this.contexts.has(key)) {
      throw new DataSafeHavenParameterError(`Context '${key}' is not defined.`);
    }
  }

  get context(): Context | null {
    return this.selectedKey === null ? null : this.contexts.get(this.selectedKey) ?? null;
  }

  assertContext(): Context {
    return this.assertSelected()[1];
  }

  private assertSelected(): [string, Context] {
    const context = this.context;
    if (this.selectedKey === null || !context) {
      throw new DataSafeHavenConfigError('No context selected.');
    }
    return [this.selectedKey, context];
  }

  get available(): string[] {
    return [...this.contexts.keys()];
  }

  /**
   * Change fields of the selected context
   */
  update(fields: Partial<ContextSettings>): void {
    const [key, context] = this.assertSelected();
    getLogger().debug(`Updating '${key}' with settings: ${JSON.stringify(fields)}.`);
    this.contexts.set(key, new Context(validateContext({ ...context.settings, ...fields })));
  }

  /**
   * Add a context, keyed by the lowercase alphanumeric form of its name
   */
  add(fields: ContextSettings): string {
    const context = new Context(validateContext(fields));
    const key = context.shmName;
    if (this.contexts.has(key)) {
      throw new DataSafeHavenParameterError(`A context with key '${key}' is already defined.`);
    }
    this.contexts.set(key, context);
    return key;
  }

  remove(key: string): void {
    if (!this.contexts.has(key)) {
      throw new DataSafeHavenParameterError(`No context with key '${key}'.`);
    }
    this.contexts.delete(key);
    if (this.selectedKey === key) {
      this.selectedKey = null;
    }
  }

  toYaml(): string {
    const contexts: Record<string, ContextSettings> = {};
    for (const [key, context] of this.contexts) {
      contexts[key] = context.settings;
    }
    return yaml.dump({ selected: this.selectedKey, contexts }, { noRefs: true });
  }

  write(configFilePath: string = getContextsPath()): void {
    fs.mkdirSync(path.dirname(configFilePath), { recursive: true });
    fs.writeFileSync(configFilePath, this.toYaml(), 'utf8');
    getLogger().debug(`Saved context settings to '${configFilePath}'.`);
  }
}

function validateContext(fields: unknown): ContextSettings {
  const parsed = ContextSchema.safeParse(fields);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new DataSafeHavenParameterError(`Invalid context settings.\n${details.join('\n')}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
