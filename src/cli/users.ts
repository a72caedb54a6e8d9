/**
 * `dsh users` commands: research users in the SHM's Entra ID
 */

import type { Command } from 'commander';

import { UserHandler } from '../administration/users/user-handler.js';
import { DSHPulumiConfig } from '../config/pulumi-config.js';
import { SHMConfig } from '../config/shm-config.js';
import type { Context } from '../context/context.js';
import { GraphApi } from '../external/graph-api.js';
import { getLogger } from '../utils/logger.js';
import { sanitiseSreName, SHM_PROJECT_NAME, sreProjectName } from '../utils/naming.js';
import {
  type CommandServices,
  requireProject,
  selectedContext,
  withErrorContext,
} from './common.js';

const SRE_PROJECT_PREFIX = 'sre-';

interface DeployedShm {
  context: Context;
  pulumiConfig: DSHPulumiConfig;
  tenantId: string;
}

async function deployedShm(services: CommandServices): Promise<DeployedShm> {
  const context = selectedContext();
  const azureApi = services.azureApiFor(context);
  const config = await SHMConfig.fromRemote(context, azureApi);
  const pulumiConfig = await DSHPulumiConfig.fromRemoteOrCreate(context, azureApi);
  requireProject(pulumiConfig, SHM_PROJECT_NAME, 'SHM');
  return { context, pulumiConfig, tenantId: config.shm.entra_tenant_id };
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function registerUsersCommands(program: Command, services: CommandServices): void {
  const users = program.command('users').description('Manage users of a Data Safe Haven deployment');

  users
    .command('add <csv>')
    .description('Add users from a CSV file with columns GivenName, Surname, Phone, Email and CountryCode')
    .action(async (csv: string) => {
      const { context, tenantId } = await deployedShm(services);
      await withErrorContext(`Could not add users to Data Safe Haven '${context.name}'.`, async () => {
        const graphApi = new GraphApi({
          tenantId,
          scopes: ['Group.Read.All', 'User.ReadWrite.All', 'UserAuthenticationMethod.ReadWrite.All'],
        });
        await new UserHandler(graphApi).add(csv);
      });
    });

  users
    .command('list')
    .description('List users and the SREs they are registered with')
    .action(async () => {
      const { context, pulumiConfig, tenantId } = await deployedShm(services);
      await withErrorContext(`Could not list users for Data Safe Haven '${context.name}'.`, async () => {
        const graphApi = new GraphApi({ tenantId, scopes: ['Directory.Read.All', 'Group.Read.All'] });
        const sreNames = pulumiConfig.projectNames
          .filter((name) => name.startsWith(SRE_PROJECT_PREFIX))
          .map((name) => name.slice(SRE_PROJECT_PREFIX.length));
        console.log(await new UserHandler(graphApi, sreNames).list());
      });
    });

  users
    .command('register <sre>')
    .description('Register existing users with a deployed SRE')
    .requiredOption('-u, --username <username>', 'Username to register; may be repeated', collect)
    .action(async (sre: string, options: { username: string[] }) => {
      const { context, pulumiConfig, tenantId } = await deployedShm(services);
      const sreName = sanitiseSreName(sre);
      requireProject(pulumiConfig, sreProjectName(sre), 'SRE');
      await withErrorContext(
        `Could not register users from Data Safe Haven '${context.name}' with SRE '${sreName}'.`,
        async () => {
          const logger = getLogger();
          logger.info(`Preparing to register ${options.username.length} user(s) with SRE '${sreName}'.`);
          const graphApi = new GraphApi({ tenantId, scopes: ['Group.ReadWrite.All', 'GroupMember.ReadWrite.All'] });
          const handler = new UserHandler(graphApi);
          const available = await handler.getUsernames();
          const known = options.username.filter((username) => {
            if (available.includes(username)) return true;
            logger.error(
              `Username '${username}' does not belong to this Data Safe Haven deployment. Please use 'dsh users add' to create it.`
            );
            return false;
          });
          await handler.register(sreName, known);
        }
      );
    });

  users
    .command('unregister <sre>')
    .description('Remove users from a deployed SRE')
    .requiredOption('-u, --username <username>', 'Username to unregister; may be repeated', collect)
    .action(async (sre: string, options: { username: string[] }) => {
      const { context, pulumiConfig, tenantId } = await deployedShm(services);
      const sreName = sanitiseSreName(sre);
      requireProject(pulumiConfig, sreProjectName(sre), 'SRE');
      await withErrorContext(
        `Could not unregister users from Data Safe Haven '${context.name}' with SRE '${sreName}'.`,
        async () => {
          const graphApi = new GraphApi({ tenantId, scopes: ['Group.ReadWrite.All', 'GroupMember.ReadWrite.All'] });
          await new UserHandler(graphApi).unregister(sreName, options.username);
        }
      );
    });

  users
    .command('remove')
    .description('Remove users from a Data Safe Haven deployment')
    .requiredOption('-u, --username <username>', 'Username to remove; may be repeated', collect)
    .action(async (options: { username: string[] }) => {
      const { context, tenantId } = await deployedShm(services);
      await withErrorContext(`Could not remove users from Data Safe Haven '${context.name}'.`, async () => {
        const graphApi = new GraphApi({ tenantId, scopes: ['User.ReadWrite.All'] });
        await new UserHandler(graphApi).remove(options.username);
      });
    });
}
