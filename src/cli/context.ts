/**
 * `dsh context` commands: manage the local list of contexts and the Azure
 * backend that each one needs.
 */

import * as fs from 'fs';
import type { Command } from 'commander';

import { getContextsPath } from '../constants/config-files.js';
import { ContextManager } from '../context/context-manager.js';
import { ContextInfrastructure } from '../infrastructure/context-infrastructure.js';
import { getLogger } from '../utils/logger.js';
import { ask, confirm } from '../utils/prompts.js';
import { type CommandServices, withErrorContext } from './common.js';

interface ContextOptions {
  adminGroupId?: string;
  location?: string;
  name?: string;
  subscriptionName?: string;
}

function loadOrCreateManager(): ContextManager {
  return fs.existsSync(getContextsPath()) ? ContextManager.fromFile() : new ContextManager();
}

function withContextOptions(command: Command): Command {
  return command
    .option('--admin-group-id <id>', 'ID of the Entra group whose members administer this deployment')
    .option('--location <location>', 'Azure location to deploy resources into, e.g. uksouth')
    .option('--name <name>', 'Name of the Data Safe Haven deployment')
    .option('--subscription-name <name>', 'Name of the Azure subscription to deploy into');
}

export function registerContextCommands(program: Command, services: CommandServices): void {
  const context = program.command('context').description('Manage Data Safe Haven contexts');

  withContextOptions(context.command('add').description('Add a new context'))
    .action(async (options: ContextOptions) => {
      const manager = loadOrCreateManager();
      const key = manager.add({
        admin_group_id: options.adminGroupId ?? (await ask('Entra ID group of administrators')),
        location: options.location ?? (await ask('Azure location', 'uksouth')),
        name: options.name ?? (await ask('Name of this deployment')),
        subscription_name: options.subscriptionName ?? (await ask('Azure subscription name')),
      });
      if (manager.selected === null) {
        manager.selected = key;
      }
      manager.write();
      getLogger().info(`Added context '${key}'.`);
    });

  context
    .command('available')
    .description('List the available contexts')
    .action(() => {
      const manager = ContextManager.fromFile();
      for (const key of manager.available) {
        console.log(key === manager.selected ? `* ${key}` : `  ${key}`);
      }
    });

  context
    .command('create')
    .description('Create the Azure backend for the selected context')
    .action(async () => {
      const selected = ContextManager.fromFile().assertContext();
      await withErrorContext(`Could not create context backend for '${selected.name}'.`, () =>
        new ContextInfrastructure(selected, services.azureApiFor(selected)).create()
      );
    });

  context
    .command('remove <key>')
    .description('Remove a context from the local list')
    .action((key: string) => {
      const manager = ContextManager.fromFile();
      manager.remove(key);
      manager.write();
      getLogger().info(`Removed context '${key}'.`);
    });

  context
    .command('show')
    .description('Show the selected context')
    .action(() => {
      const manager = ContextManager.fromFile();
      const selected = manager.context;
      if (!selected) {
        getLogger().info('No context selected.');
        return;
      }
      console.log(`Current context: ${manager.selected}`);
      console.log(`\tName: ${selected.name}`);
      console.log(`\tAdmin group ID: ${selected.adminGroupId}`);
      console.log(`\tSubscription name: ${selected.subscriptionName}`);
      console.log(`\tLocation: ${selected.location}`);
    });

  context
    .command('switch <key>')
    .description('Select a context')
    .action((key: string) => {
      const manager = ContextManager.fromFile();
      manager.selected = key;
      manager.write();
    });

  context
    .command('teardown')
    .description('Delete the Azure backend of the selected context')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (options: { yes?: boolean }) => {
      const selected = ContextManager.fromFile().assertContext();
      const proceed =
        options.yes ||
        (await confirm(`Delete resource group '${selected.resourceGroupName}' and everything in it?`, false));
      if (!proceed) return;
      await withErrorContext(`Could not tear down context backend for '${selected.name}'.`, () =>
        new ContextInfrastructure(selected, services.azureApiFor(selected)).teardown()
      );
    });

  withContextOptions(context.command('update').description('Update the selected context'))
    .action((options: ContextOptions) => {
      const manager = ContextManager.fromFile();
      manager.update({
        ...(options.adminGroupId === undefined ? {} : { admin_group_id: options.adminGroupId }),
        ...(options.location === undefined ? {} : { location: options.location }),
        ...(options.name === undefined ? {} : { name: options.name }),
        ...(options.subscriptionName === undefined ? {} : { subscription_name: options.subscriptionName }),
      });
      manager.write();
      getLogger().info(`Updated context '${manager.selected}'.`);
    });
}
