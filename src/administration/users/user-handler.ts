/**
 * User Handler
 *
 * Manages research users in the SHM's Entra ID tenant and their
 * membership of per-SRE security groups.
 */

import type { DirectoryGroup, DirectoryUser, UserDirectory } from '../../external/interfaces.js';
import { DataSafeHavenUserHandlingError, errorMessage } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { password } from '../../utils/naming.js';
import { tabulate } from '../../utils/table.js';
import { GENERATED_PASSWORD_LENGTH } from '../../infrastructure/programs/secrets.js';
import { readResearchUsersCsv } from './csv-import.js';
import { ResearchUser } from './research-user.js';

export const SRE_GROUP_ROLES = ['Users', 'Privileged Users', 'Administrators'] as const;

export function sreGroupName(sreName: string, role: (typeof SRE_GROUP_ROLES)[number] = 'Users'): string {
  return `${sreName} ${role}`;
}

export class UserHandler {
  constructor(
    private readonly directory: UserDirectory,
    /** SREs shown as columns by list() */
    private readonly sreNames: string[] = []
  ) {}

  /**
   * Create every user in the CSV file that does not already exist
   */
  async add(csvPath: string): Promise<void> {
    const logger = getLogger();
    const users = readResearchUsersCsv(csvPath);
    try {
      const domain = await this.directory.defaultDomain();
      const known = (await this.directory.listUsers()).map((user) => ResearchUser.fromDirectoryUser(user));

      for (const user of users) {
        if (known.some((existing) => existing.equals(user))) {
          logger.warning(`User '${user.username}' already exists.`);
          continue;
        }
        const created = await this.directory.createUser({
          accountEnabled: user.accountEnabled,
          displayName: user.displayName,
          givenName: user.givenName,
          surname: user.surname,
          mail: user.emailAddress,
          mailNickname: user.username,
          userPrincipalName: `${user.username}@${domain}`,
          usageLocation: user.countryCode,
          password: password(GENERATED_PASSWORD_LENGTH),
        });
        if (user.emailAddress) {
          await this.directory.addAuthenticationEmail(created.id, user.emailAddress);
        }
        if (user.phoneNumber) {
          await this.directory.addAuthenticationPhone(created.id, user.phoneNumber);
        }
        known.push(user);
        logger.info(`Ensured user '${user.username}@${domain}' exists in Entra ID.`);
      }
    } catch (e) {
      throw new DataSafeHavenUserHandlingError(`Could not add users from '${csvPath}'.\n${errorMessage(e)}`, {
        cause: e,
      });
    }
  }

  async getUsernames(): Promise<string[]> {
    const users = await this.directory.listUsers();
    return users.map((user) => user.mailNickname).sort();
  }

  /**
   * Table of users and the SREs they are registered with
   */
  async list(): Promise<string> {
    const users = await this.directory.listUsers();
    const groups = await this.directory.listGroups();
    const registered = new Map<string, Set<string>>();
    for (const sreName of this.sreNames) {
      const group = groups.find((g) => g.displayName === sreGroupName(sreName));
      const members = group ? await this.directory.listGroupMembers(group.id) : [];
      registered.set(sreName, new Set(members.map((member) => member.mailNickname)));
    }

    const rows = users
      .map((user) => user.mailNickname)
      .sort()
      .map((username) => [
        username,
        'x',
        ...this.sreNames.map((sreName) => (registered.get(sreName)?.has(username) ? 'x' : '')),
      ]);
    return tabulate(['username', 'Entra ID', ...this.sreNames.map((sreName) => `SRE ${sreName}`)], rows);
  }

  async register(sreName: string, usernames: string[]): Promise<void> {
    const logger = getLogger();
    try {
      const group = await this.directory.ensureGroup(sreGroupName(sreName));
      const users = await this.directory.listUsers();
      const members = new Set((await this.directory.listGroupMembers(group.id)).map((user) => user.id));

      for (const username of usernames) {
        const user = findUser(users, username);
        if (!user) {
          logger.error(`Could not find user '${username}'.`);
          continue;
        }
        if (members.has(user.id)) {
          logger.info(`User '${username}' is already registered with SRE '${sreName}'.`);
          continue;
        }
        await this.directory.addGroupMember(group.id, user.id);
        members.add(user.id);
        logger.info(`Registered user '${username}' with SRE '${sreName}'.`);
      }
    } catch (e) {
      throw new DataSafeHavenUserHandlingError(
        `Could not register users with SRE '${sreName}'.\n${errorMessage(e)}`,
        { cause: e }
      );
    }
  }

  /**
   * Remove users from every group belonging to the SRE
   */
  async unregister(sreName: string, usernames: string[]): Promise<void> {
    const logger = getLogger();
    try {
      const users = await this.directory.listUsers();
      const groups = await this.directory.listGroups();
      for (const role of SRE_GROUP_ROLES) {
        const group = groups.find((g) => g.displayName === sreGroupName(sreName, role));
        if (!group) {
          logger.debug(`Group '${sreGroupName(sreName, role)}' does not exist.`);
          continue;
        }
        await this.removeMembers(group, users, usernames);
      }
    } catch (e) {
      throw new DataSafeHavenUserHandlingError(
        `Could not unregister users from SRE '${sreName}'.\n${errorMessage(e)}`,
        { cause: e }
      );
    }
  }

  async remove(usernames: string[]): Promise<void> {
    const logger = getLogger();
    try {
      const users = await this.directory.listUsers();
      for (const username of usernames) {
        const user = findUser(users, username);
        if (!user) {
          logger.warning(`Could not find user '${username}'.`);
          continue;
        }
        await this.directory.deleteUser(user.id);
        logger.info(`Removed user '${username}'.`);
      }
    } catch (e) {
      throw new DataSafeHavenUserHandlingError(`Could not remove users.\n${errorMessage(e)}`, { cause: e });
    }
  }

  private async removeMembers(group: DirectoryGroup, users: DirectoryUser[], usernames: string[]): Promise<void> {
    const logger = getLogger();
    const members = new Set((await this.directory.listGroupMembers(group.id)).map((user) => user.id));
    for (const username of usernames) {
      const user = findUser(users, username);
      if (!user || !members.has(user.id)) continue;
      await this.directory.removeGroupMember(group.id, user.id);
      logger.info(`Removed user '${username}' from group '${group.displayName}'.`);
    }
  }
}

function findUser(users: DirectoryUser[], username: string): DirectoryUser | undefined {
  return users.find((user) => user.mailNickname === username);
}
