/**
 * `dsh shm` commands: deploy or tear down the Safe Haven Management environment
 */

import type { Command } from 'commander';

import { DSHPulumiConfig } from '../config/pulumi-config.js';
import { SHMConfig } from '../config/shm-config.js';
import { shmProgram } from '../infrastructure/programs/shm/index.js';
import { DataSafeHavenError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { SHM_PROJECT_NAME, shmStackName } from '../utils/naming.js';
import { confirm } from '../utils/prompts.js';
import {
  type CommandServices,
  projectManagerFor,
  requireProject,
  selectedContext,
  withErrorContext,
} from './common.js';

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export function registerShmCommands(program: Command, services: CommandServices): void {
  const shm = program.command('shm').description('Manage Safe Haven Management (SHM) infrastructure');

  shm
    .command('deploy')
    .description('Deploy or update the SHM for the selected context')
    .action(async () => {
      const context = selectedContext();
      const azureApi = services.azureApiFor(context);
      await withErrorContext(`Could not deploy Data Safe Haven '${context.name}'.`, async () => {
        const config = await SHMConfig.fromRemote(context, azureApi);
        const pulumiConfig = await DSHPulumiConfig.fromRemoteOrCreate(context, azureApi);
        const stackName = shmStackName(context.shmName);
        const manager = await projectManagerFor({
          context,
          azureApi,
          pulumiConfig,
          projectName: SHM_PROJECT_NAME,
          stackName,
          program: shmProgram({ context, config, stackName }),
        });
        await manager.deploy();

        const nameServers = stringList(await manager.output('dnsNameServers'));
        const logger = getLogger();
        logger.info(`Delegate '${config.shm.fqdn}' to these name servers at your domain registrar:`);
        for (const server of nameServers) {
          logger.info(`  ${server}`);
        }
      });
    });

  shm
    .command('teardown')
    .description('Tear down the SHM for the selected context')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (options: { yes?: boolean }) => {
      const context = selectedContext();
      const azureApi = services.azureApiFor(context);
      await withErrorContext(`Could not tear down Data Safe Haven '${context.name}'.`, async () => {
        const config = await SHMConfig.fromRemote(context, azureApi);
        const pulumiConfig = await DSHPulumiConfig.fromRemoteOrCreate(context, azureApi);
        requireProject(pulumiConfig, SHM_PROJECT_NAME, 'SHM');
        const sreProjects = pulumiConfig.projectNames.filter((name) => name !== SHM_PROJECT_NAME);
        if (sreProjects.length) {
          throw new DataSafeHavenError(
            `Tear down these SREs before the SHM: ${sreProjects.map((name) => `'${name}'`).join(', ')}.`
          );
        }
        if (!options.yes && !(await confirm(`Tear down the SHM for '${context.name}'?`, false))) return;

        const stackName = shmStackName(context.shmName);
        const manager = await projectManagerFor({
          context,
          azureApi,
          pulumiConfig,
          projectName: SHM_PROJECT_NAME,
          stackName,
          program: shmProgram({ context, config, stackName }),
        });
        await manager.teardown();
      });
    });
}
