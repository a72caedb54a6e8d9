/**
 * Config Section Updates
 *
 * Apply the values a user supplied to one section of a configuration,
 * logging what each field will be afterwards.
 */

import type { z } from 'zod';

import { DataSafeHavenParameterError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
  RemoteDesktopSectionSchema,
  SHMSectionSchema,
  SRESectionSchema,
  type DatabaseSystem,
  type RemoteDesktopSection,
  type SHMSection,
  type SoftwarePackageCategory,
  type SRESection,
} from './schema.js';

export interface SHMSectionUpdate {
  entraTenantId?: string;
  fqdn?: string;
}

export interface RemoteDesktopUpdate {
  allowCopy?: boolean;
  allowPaste?: boolean;
}

export interface SRESectionUpdate {
  adminEmailAddress?: string;
  adminIpAddresses?: string[];
  dataProviderIpAddresses?: string[];
  databases?: DatabaseSystem[];
  softwarePackages?: SoftwarePackageCategory;
  timezone?: string;
  userIpAddresses?: string[];
  workspaceSkus?: string[];
}

function revalidate<T extends z.ZodTypeAny>(sectionName: string, schema: T, value: z.input<T>): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new DataSafeHavenParameterError(`Invalid ${sectionName} settings.\n${details.join('\n')}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function nonEmpty<T>(values: T[] | undefined): values is T[] {
  return values !== undefined && values.length > 0;
}

export function updateShmSection(section: SHMSection, update: SHMSectionUpdate): SHMSection {
  const logger = getLogger();
  const next = { ...section };

  if (update.entraTenantId) next.entra_tenant_id = update.entraTenantId;
  logger.info(`Entra tenant ID will be ${next.entra_tenant_id}.`);

  if (update.fqdn) next.fqdn = update.fqdn;
  logger.info(`Fully-qualified domain name will be ${next.fqdn}.`);

  return revalidate('SHM', SHMSectionSchema, next);
}

export function updateRemoteDesktopSection(
  section: RemoteDesktopSection,
  update: RemoteDesktopUpdate
): RemoteDesktopSection {
  const logger = getLogger();
  const next = { ...section };

  if (update.allowCopy !== undefined) next.allow_copy = update.allowCopy;
  logger.info(`Copying text out of the SRE will be ${next.allow_copy ? 'allowed' : 'forbidden'}.`);

  if (update.allowPaste !== undefined) next.allow_paste = update.allowPaste;
  logger.info(`Pasting text into the SRE will be ${next.allow_paste ? 'allowed' : 'forbidden'}.`);

  return revalidate('remote desktop', RemoteDesktopSectionSchema, next);
}

export function updateSreSection(section: SRESection, update: SRESectionUpdate): SRESection {
  const logger = getLogger();
  const next = { ...section };

  if (update.adminEmailAddress) next.admin_email_address = update.adminEmailAddress;
  logger.info(`Admin email address will be ${next.admin_email_address}.`);

  if (nonEmpty(update.adminIpAddresses)) next.admin_ip_addresses = update.adminIpAddresses;
  logger.info(`IP addresses used by administrators will be ${JSON.stringify(next.admin_ip_addresses)}.`);

  if (nonEmpty(update.dataProviderIpAddresses)) next.data_provider_ip_addresses = update.dataProviderIpAddresses;
  logger.info(
    `IP addresses used by data providers will be ${JSON.stringify(next.data_provider_ip_addresses)}.`
  );

  if (nonEmpty(update.databases)) {
    next.databases = [...new Set(update.databases)].sort();
    if (next.databases.length !== update.databases.length) {
      logger.warning("Discarding duplicate values for 'database'.");
    }
  }
  logger.info(`Databases available to users will be ${JSON.stringify(next.databases)}.`);

  if (update.softwarePackages) next.software_packages = update.softwarePackages;
  logger.info(`Software packages from ${next.software_packages} sources will be installable.`);

  if (update.timezone) next.timezone = update.timezone;
  logger.info(`Timezone will be ${next.timezone}.`);

  if (nonEmpty(update.userIpAddresses)) next.research_user_ip_addresses = update.userIpAddresses;
  logger.info(`IP addresses used by users will be ${JSON.stringify(next.research_user_ip_addresses)}.`);

  if (nonEmpty(update.workspaceSkus)) next.workspace_skus = update.workspaceSkus;
  logger.info(`Workspace SKUs will be ${JSON.stringify(next.workspace_skus)}.`);

  return revalidate('SRE', SRESectionSchema, next);
}
