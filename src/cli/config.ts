/**
 * `dsh config` commands: SHM and SRE configuration stored in the context
 */

import * as fs from 'fs';
import { Option, type Command } from 'commander';

import { updateRemoteDesktopSection, updateShmSection, updateSreSection } from '../config/sections.js';
import {
  DATABASE_SYSTEMS,
  SOFTWARE_PACKAGE_CATEGORIES,
  type DatabaseSystem,
  type SoftwarePackageCategory,
} from '../config/schema.js';
import { SHMConfig } from '../config/shm-config.js';
import { SREConfig } from '../config/sre-config.js';
import { DataSafeHavenConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { type CommandServices, selectedContext } from './common.js';

function readFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new DataSafeHavenConfigError(`Could not find file ${filePath}.`);
  }
  return fs.readFileSync(filePath, 'utf8');
}

function output(text: string, file?: string): void {
  if (file) {
    fs.writeFileSync(file, text, 'utf8');
    getLogger().info(`Wrote configuration to '${file}'.`);
  } else {
    console.log(text);
  }
}

interface SreUpdateOptions {
  adminEmailAddress?: string;
  adminIp?: string[];
  allowCopy?: boolean;
  allowPaste?: boolean;
  database?: DatabaseSystem[];
  dataProviderIp?: string[];
  softwarePackages?: SoftwarePackageCategory;
  timezone?: string;
  userIp?: string[];
  workspaceSku?: string[];
}

export function registerConfigCommands(program: Command, services: CommandServices): void {
  const config = program.command('config').description('Manage Data Safe Haven configurations');

  // SHM

  config
    .command('show')
    .description('Print the SHM configuration for the selected context')
    .option('--file <path>', 'File to write the configuration to')
    .action(async (options: { file?: string }) => {
      const context = selectedContext();
      const shmConfig = await SHMConfig.fromRemote(context, services.azureApiFor(context));
      output(shmConfig.toYaml(), options.file);
    });

  config
    .command('template')
    .description('Write a template SHM configuration')
    .option('--file <path>', 'File to write the template to')
    .action((options: { file?: string }) => {
      output(SHMConfig.template(), options.file);
    });

  config
    .command('update')
    .description('Change values in the SHM configuration')
    .option('--entra-tenant-id <id>', 'Tenant ID of the Entra ID that holds research users')
    .option('--fqdn <domain>', 'Domain that SREs are deployed under')
    .action(async (options: { entraTenantId?: string; fqdn?: string }) => {
      const context = selectedContext();
      const azureApi = services.azureApiFor(context);
      const current = await SHMConfig.fromRemote(context, azureApi);
      const updated = new SHMConfig({ ...current.settings, shm: updateShmSection(current.shm, options) });
      await updated.upload(context, azureApi);
    });

  config
    .command('upload <file>')
    .description('Upload an SHM configuration to the selected context')
    .action(async (file: string) => {
      const context = selectedContext();
      const shmConfig = SHMConfig.fromYaml(readFile(file));
      await shmConfig.upload(context, services.azureApiFor(context));
    });

  // SRE

  config
    .command('show-sre <name>')
    .description('Print the configuration of an SRE')
    .option('--file <path>', 'File to write the configuration to')
    .action(async (name: string, options: { file?: string }) => {
      const context = selectedContext();
      const sreConfig = await SREConfig.fromRemote(context, services.azureApiFor(context), name);
      output(sreConfig.toYaml(), options.file);
    });

  config
    .command('template-sre')
    .description('Write a template SRE configuration')
    .option('--file <path>', 'File to write the template to')
    .action((options: { file?: string }) => {
      output(SREConfig.template(), options.file);
    });

  config
    .command('update-sre <name>')
    .description('Change values in the configuration of an SRE')
    .option('--admin-email-address <email>', 'Email address shared by SRE administrators')
    .option('--admin-ip <addresses...>', 'IP addresses or ranges used by administrators')
    .option('--allow-copy', 'Allow copying text out of the SRE')
    .option('--no-allow-copy', 'Forbid copying text out of the SRE')
    .option('--allow-paste', 'Allow pasting text into the SRE')
    .option('--no-allow-paste', 'Forbid pasting text into the SRE')
    .addOption(new Option('--database <systems...>', 'Database systems to deploy').choices(DATABASE_SYSTEMS))
    .option('--data-provider-ip <addresses...>', 'IP addresses or ranges used by data providers')
    .addOption(
      new Option('--software-packages <category>', 'Packages that users may install').choices(
        SOFTWARE_PACKAGE_CATEGORIES
      )
    )
    .option('--timezone <timezone>', 'Timezone in IANA format, e.g. Europe/London')
    .option('--user-ip <addresses...>', 'IP addresses or ranges used by research users')
    .option('--workspace-sku <skus...>', 'VM SKUs for workspaces, e.g. Standard_D2s_v3')
    .action(async (name: string, options: SreUpdateOptions) => {
      const context = selectedContext();
      const azureApi = services.azureApiFor(context);
      const current = await SREConfig.fromRemote(context, azureApi, name);
      const sre = updateSreSection(current.sre, {
        adminEmailAddress: options.adminEmailAddress,
        adminIpAddresses: options.adminIp,
        dataProviderIpAddresses: options.dataProviderIp,
        databases: options.database,
        softwarePackages: options.softwarePackages,
        timezone: options.timezone,
        userIpAddresses: options.userIp,
        workspaceSkus: options.workspaceSku,
      });
      sre.remote_desktop = updateRemoteDesktopSection(sre.remote_desktop, {
        allowCopy: options.allowCopy,
        allowPaste: options.allowPaste,
      });
      await new SREConfig({ ...current.settings, sre }).upload(context, azureApi);
    });

  config
    .command('upload-sre <file>')
    .description('Upload an SRE configuration to the selected context')
    .action(async (file: string) => {
      const context = selectedContext();
      const sreConfig = SREConfig.fromYaml(readFile(file));
      await sreConfig.upload(context, services.azureApiFor(context));
    });
}
