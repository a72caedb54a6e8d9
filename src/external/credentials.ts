/**
 * Credentials
 *
 * Azure Resource Manager calls authenticate through the Azure CLI login;
 * Microsoft Graph calls use a device-code login against the Entra tenant
 * that holds research users.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  AzureCliCredential,
  DeviceCodeCredential,
  deserializeAuthenticationRecord,
  serializeAuthenticationRecord,
  type AuthenticationRecord,
  type DeviceCodeInfo,
  type TokenCredential,
} from '@azure/identity';
import { z } from 'zod';

import { configDir } from '../constants/config-files.js';
import { DataSafeHavenAzureError, DataSafeHavenMicrosoftGraphError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const AZURE_MANAGEMENT_SCOPE = 'https://management.azure.com/.default';
const GRAPH_API_ROOT = 'https://graph.microsoft.com/';
// Microsoft Graph Command Line Tools
const GRAPH_CLI_CLIENT_ID = '14d82eec-204b-4c2f-b7e8-296a70dab67e';

const TokenClaimsSchema = z.record(z.unknown());

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

/**
 * Claims carried in the payload of a JWT access token
 */
export function decodeToken(token: string): TokenClaims {
  try {
    const payload = token.split('.')[1];
    if (!payload) {
      throw new Error('Token has no payload.');
    }
    return TokenClaimsSchema.parse(JSON.parse(Buffer.from(payload, 'base64url').toString('utf8')));
  } catch (e) {
    throw new DataSafeHavenAzureError('Error getting account information from Azure CLI.', { cause: e });
  }
}

/**
 * Creates its credential on first use and keeps it for the process
 */
abstract class DeferredCredential {
  private credential: TokenCredential | null = null;

  protected abstract createCredential(): Promise<TokenCredential>;

  protected abstract get scopes(): string[];

  async getCredential(): Promise<TokenCredential> {
    if (!this.credential) {
      this.credential = await this.createCredential();
    }
    return this.credential;
  }

  async token(): Promise<string> {
    const credential = await this.getCredential();
    const accessToken = await credential.getToken(this.scopes);
    if (!accessToken) {
      throw new DataSafeHavenAzureError('Failed to obtain an access token.');
    }
    return accessToken.token;
  }

  decodeToken(token: string): TokenClaims {
    return decodeToken(token);
  }
}

export interface AccountInformation {
  name: string;
  userId: string;
  tenantId: string;
  upn: string | null;
}

export class AzureSdkCredential extends DeferredCredential {
  protected get scopes(): string[] {
    return [AZURE_MANAGEMENT_SCOPE];
  }

  protected async createCredential(): Promise<TokenCredential> {
    return new AzureCliCredential({ additionallyAllowedTenants: ['*'] });
  }

  /**
   * Who is logged in to the Azure CLI
   */
  async accountInformation(): Promise<AccountInformation> {
    const claims = this.decodeToken(await this.token());
    const text = (key: string): string | null => {
      const value = claims[key];
      return typeof value === 'string' ? value : null;
    };
    const userId = text('oid');
    const tenantId = text('tid');
    if (!userId || !tenantId) {
      throw new DataSafeHavenAzureError('Error getting account information from Azure CLI.');
    }
    return { name: text('name') ?? userId, userId, tenantId, upn: text('upn') };
  }
}

export class GraphApiCredential extends DeferredCredential {
  constructor(
    readonly tenantId: string,
    readonly defaultScopes: string[] = []
  ) {
    super();
  }

  protected get scopes(): string[] {
    return this.defaultScopes.map((scope) => (scope.startsWith('https://') ? scope : `${GRAPH_API_ROOT}${scope}`));
  }

  get authenticationRecordPath(): string {
    return path.join(configDir(), `.msal-authentication-cache-dsh-${this.tenantId}`);
  }

  protected async createCredential(): Promise<TokenCredential> {
    const existingRecord = this.readAuthenticationRecord();
    const credential = new DeviceCodeCredential({
      tenantId: this.tenantId,
      clientId: GRAPH_CLI_CLIENT_ID,
      authenticationRecord: existingRecord,
      userPromptCallback: (info: DeviceCodeInfo) => {
        getLogger().info(
          `Go to ${info.verificationUri} in a web browser and enter the code ${info.userCode} at the prompt.`
        );
      },
    });

    try {
      const record = await credential.authenticate(this.scopes);
      if (record) {
        this.writeAuthenticationRecord(record);
      }
    } catch (e) {
      throw new DataSafeHavenMicrosoftGraphError(
        `Could not authenticate with Microsoft Graph in tenant '${this.tenantId}'.`,
        { cause: e }
      );
    }
    return credential;
  }

  private readAuthenticationRecord(): AuthenticationRecord | undefined {
    if (!fs.existsSync(this.authenticationRecordPath)) return undefined;
    try {
      return deserializeAuthenticationRecord(fs.readFileSync(this.authenticationRecordPath, 'utf8'));
    } catch (e) {
      getLogger().debug(`Ignoring unreadable authentication record: ${String(e)}`);
      return undefined;
    }
  }

  private writeAuthenticationRecord(record: AuthenticationRecord): void {
    fs.mkdirSync(path.dirname(this.authenticationRecordPath), { recursive: true });
    fs.writeFileSync(this.authenticationRecordPath, serializeAuthenticationRecord(record), 'utf8');
  }
}
