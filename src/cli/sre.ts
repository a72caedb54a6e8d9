/**
 * `dsh sre` commands: deploy or tear down a Secure Research Environment
 */

import type { Command } from 'commander';

import { DSHPulumiConfig } from '../config/pulumi-config.js';
import { SHMConfig } from '../config/shm-config.js';
import { SREConfig } from '../config/sre-config.js';
import type { Context } from '../context/context.js';
import type { AzureApi } from '../external/azure-api.js';
import { sreProgram } from '../infrastructure/programs/sre/index.js';
import { GENERATED_PASSWORD_LENGTH, SRE_SECRET_NAMES } from '../infrastructure/programs/secrets.js';
import type { ProjectManager } from '../infrastructure/project-manager.js';
import { allocateSreIndex, SRE_INDEX_KEY } from '../infrastructure/sre-index.js';
import { DataSafeHavenConfigError, DataSafeHavenInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
  password,
  SHM_PROJECT_NAME,
  shmStackName,
  sreProjectName,
  sreStackName,
} from '../utils/naming.js';
import { currentIpAddress, ipAddressInList } from '../utils/network.js';
import { confirm } from '../utils/prompts.js';
import {
  type CommandServices,
  projectManagerFor,
  requireProject,
  selectedContext,
  withErrorContext,
} from './common.js';

async function sreProjectManager(
  context: Context,
  azureApi: AzureApi,
  pulumiConfig: DSHPulumiConfig,
  sreConfig: SREConfig,
  sreIndex: number
): Promise<ProjectManager> {
  const shmConfig = await SHMConfig.fromRemote(context, azureApi);
  const stackName = sreStackName(context.shmName, sreConfig.name);
  return projectManagerFor({
    context,
    azureApi,
    pulumiConfig,
    projectName: sreProjectName(sreConfig.name),
    stackName,
    program: sreProgram({
      context,
      shmConfig,
      sreConfig,
      sreIndex,
      shmStackName: shmStackName(context.shmName),
      stackName,
    }),
  });
}

export function registerSreCommands(program: Command, services: CommandServices): void {
  const sre = program.command('sre').description('Manage Secure Research Environment (SRE) infrastructure');

  sre
    .command('deploy <name>')
    .description('Deploy or update an SRE')
    .action(async (name: string) => {
      const context = selectedContext();
      const azureApi = services.azureApiFor(context);
      await withErrorContext(`Could not deploy Secure Research Environment '${name}'.`, async () => {
        const sreConfig = await SREConfig.fromRemote(context, azureApi, name);
        if (!sreConfig.isComplete()) {
          throw new DataSafeHavenConfigError(
            `Configuration for SRE '${name}' is incomplete. Run 'dsh config show-sre ${name}' to check it.`
          );
        }
        if (!(await ipAddressInList(sreConfig.sre.admin_ip_addresses, services.fetcher))) {
          const current = await currentIpAddress({}, services.fetcher);
          throw new DataSafeHavenInputError(
            `IP address '${current}' is not authorised to deploy SRE '${name}'. Add it to 'admin_ip_addresses'.`
          );
        }

        const pulumiConfig = await DSHPulumiConfig.fromRemoteOrCreate(context, azureApi);
        requireProject(pulumiConfig, SHM_PROJECT_NAME, 'SHM');
        const sreIndex = allocateSreIndex(pulumiConfig, sreProjectName(sreConfig.name));
        const manager = await sreProjectManager(context, azureApi, pulumiConfig, sreConfig, sreIndex);

        await manager.addOption(SRE_INDEX_KEY, String(sreIndex));
        for (const secretName of SRE_SECRET_NAMES) {
          await manager.addSecret(secretName, password(GENERATED_PASSWORD_LENGTH));
        }
        await manager.deploy();

        const fqdn = await manager.output('sreFqdn');
        if (typeof fqdn === 'string') {
          getLogger().info(`SRE '${name}' is available at https://${fqdn}.`);
        }
      });
    });

  sre
    .command('teardown <name>')
    .description('Tear down an SRE')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (name: string, options: { yes?: boolean }) => {
      const context = selectedContext();
      const azureApi = services.azureApiFor(context);
      await withErrorContext(`Could not tear down Secure Research Environment '${name}'.`, async () => {
        const sreConfig = await SREConfig.fromRemote(context, azureApi, name);
        const pulumiConfig = await DSHPulumiConfig.fromRemoteOrCreate(context, azureApi);
        const projectName = sreProjectName(sreConfig.name);
        requireProject(pulumiConfig, projectName, 'SRE');
        if (!options.yes && !(await confirm(`Tear down SRE '${name}'?`, false))) return;

        const sreIndex = allocateSreIndex(pulumiConfig, projectName);
        const manager = await sreProjectManager(context, azureApi, pulumiConfig, sreConfig, sreIndex);
        await manager.teardown();
      });
    });
}
