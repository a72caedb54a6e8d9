/**
 * Microsoft Graph API
 *
 * The subset of Graph v1.0 used to manage research users and their SRE
 * groups in Entra ID.
 */

import { z } from 'zod';

import { DataSafeHavenMicrosoftGraphError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { GraphApiCredential } from './credentials.js';
import type { DirectoryGroup, DirectoryUser, NewDirectoryUser, UserDirectory } from './interfaces.js';

const BASE_ENDPOINT = 'https://graph.microsoft.com/v1.0';

const USER_FIELDS = [
  'id',
  'accountEnabled',
  'displayName',
  'givenName',
  'surname',
  'mail',
  'mailNickname',
  'mobilePhone',
  'usageLocation',
  'userPrincipalName',
];

const UserSchema = z.object({
  id: z.string(),
  accountEnabled: z.boolean().nullable().transform((value) => value ?? false),
  displayName: z.string().nullable().transform((value) => value ?? ''),
  givenName: z.string().nullable().transform((value) => value ?? ''),
  surname: z.string().nullable().transform((value) => value ?? ''),
  mail: z.string().nullable().default(null),
  mailNickname: z.string().nullable().transform((value) => value ?? ''),
  mobilePhone: z.string().nullable().default(null),
  usageLocation: z.string().nullable().default(null),
  userPrincipalName: z.string(),
});

const GroupSchema = z.object({
  id: z.string(),
  displayName: z.string().nullable().transform((value) => value ?? ''),
});

const DomainSchema = z.object({
  id: z.string(),
  isDefault: z.boolean(),
});

function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item),
    '@odata.nextLink': z.string().optional(),
  });
}

export interface HttpRequest {
  method: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type HttpFetcher = (url: string, request: HttpRequest) => Promise<HttpResponse>;

export interface TokenSource {
  token(): Promise<string>;
}

export interface GraphApiOptions {
  tenantId: string;
  scopes?: string[];
  credential?: TokenSource;
  fetcher?: HttpFetcher;
}

export class GraphApi implements UserDirectory {
  private readonly credential: TokenSource;
  private readonly fetcher: HttpFetcher;

  constructor(options: GraphApiOptions) {
    this.credential = options.credential ?? new GraphApiCredential(options.tenantId, options.scopes ?? []);
    this.fetcher = options.fetcher ?? fetch;
  }

  private async request(method: HttpRequest['method'], url: string, body?: object): Promise<unknown> {
    const target = url.startsWith('https://') ? url : `${BASE_ENDPOINT}${url}`;
    const token = await this.credential.token();
    const response = await this.fetcher(target, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();
    if (!response.ok) {
      throw new DataSafeHavenMicrosoftGraphError(
        `Graph API ${method} request to '${target}' failed with status ${response.status}.\n${text}`
      );
    }
    return text ? JSON.parse(text) : null;
  }

  private async readAll<T extends z.ZodTypeAny>(url: string, item: T): Promise<Array<z.output<T>>> {
    const results: Array<z.output<T>> = [];
    let next: string | undefined = url;
    while (next) {
      const page = pageOf(item).parse(await this.request('GET', next));
      results.push(...page.value);
      next = page['@odata.nextLink'];
    }
    return results;
  }

  async defaultDomain(): Promise<string> {
    try {
      const domains = await this.readAll('/domains', DomainSchema);
      const domain = domains.find((d) => d.isDefault);
      if (!domain) {
        throw new Error('No default domain is set.');
      }
      return domain.id;
    } catch (e) {
      throw new DataSafeHavenMicrosoftGraphError(`Could not load the default domain.\n${errorMessage(e)}`, {
        cause: e,
      });
    }
  }

  async listUsers(): Promise<DirectoryUser[]> {
    return this.readAll(`/users?$select=${USER_FIELDS.join(',')}`, UserSchema);
  }

  async createUser(user: NewDirectoryUser): Promise<DirectoryUser> {
    const { password, ...fields } = user;
    try {
      const created = UserSchema.parse(
        await this.request('POST', '/users', {
          ...fields,
          passwordProfile: { forceChangePasswordNextSignIn: true, password },
        })
      );
      getLogger().debug(`Created user '${user.userPrincipalName}'.`);
      return created;
    } catch (e) {
      throw new DataSafeHavenMicrosoftGraphError(
        `Could not create user '${user.userPrincipalName}'.\n${errorMessage(e)}`,
        { cause: e }
      );
    }
  }

  async deleteUser(userId: string): Promise<void> {
    await this.request('DELETE', `/users/${encodeURIComponent(userId)}`);
  }

  async addAuthenticationPhone(userId: string, phoneNumber: string): Promise<void> {
    await this.request('POST', `/users/${encodeURIComponent(userId)}/authentication/phoneMethods`, {
      phoneNumber,
      phoneType: 'mobile',
    });
  }

  async addAuthenticationEmail(userId: string, emailAddress: string): Promise<void> {
    await this.request('POST', `/users/${encodeURIComponent(userId)}/authentication/emailMethods`, {
      emailAddress,
    });
  }

  async listGroups(): Promise<DirectoryGroup[]> {
    return this.readAll('/groups?$select=id,displayName', GroupSchema);
  }

  async ensureGroup(displayName: string): Promise<DirectoryGroup> {
    const existing = (await this.listGroups()).find((group) => group.displayName === displayName);
    if (existing) return existing;
    const created = GroupSchema.parse(
      await this.request('POST', '/groups', {
        displayName,
        mailEnabled: false,
        mailNickname: displayName.replace(/[^a-zA-Z0-9]/g, ''),
        securityEnabled: true,
      })
    );
    getLogger().info(`Created group '${displayName}'.`);
    return created;
  }

  async listGroupMembers(groupId: string): Promise<DirectoryUser[]> {
    return this.readAll(
      `/groups/${encodeURIComponent(groupId)}/members/microsoft.graph.user?$select=${USER_FIELDS.join(',')}`,
      UserSchema
    );
  }

  async addGroupMember(groupId: string, userId: string): Promise<void> {
    await this.request('POST', `/groups/${encodeURIComponent(groupId)}/members/$ref`, {
      '@odata.id': `${BASE_ENDPOINT}/directoryObjects/${userId}`,
    });
  }

  async removeGroupMember(groupId: string, userId: string): Promise<void> {
    await this.request(
      'DELETE',
      `/groups/${encodeURIComponent(groupId)}/members/${encodeURIComponent(userId)}/$ref`
    );
  }
}
