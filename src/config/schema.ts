/**
 * Config Schemas
 *
 * zod schemas for every structure persisted as YAML, locally or in the
 * context's storage account. Field-level checks reuse the validators so
 * messages match what the CLI reports for bad arguments.
 */

import { z } from 'zod';

import { errorMessage } from '../utils/errors.js';
import {
  aadGuid,
  azureLocation,
  azureSubscriptionName,
  azureVmSku,
  configName,
  emailAddress,
  fqdn,
  ipAddress,
  timezone,
  uniqueList,
} from '../utils/validators.js';

/**
 * Wrap a validator so its message becomes a zod issue
 */
export function validated<T>(validator: (value: string) => T, base: z.ZodType<string> = z.string()) {
  return base.transform((value, ctx) => {
    try {
      return validator(value);
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(e) });
      return z.NEVER;
    }
  });
}

function unique<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).superRefine((items, ctx) => {
    try {
      uniqueList(items);
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(e) });
    }
  });
}

// ============================================================
// Contexts
// ============================================================

export const ContextSchema = z.object({
  admin_group_id: validated(aadGuid),
  location: validated(azureLocation),
  name: validated(configName),
  subscription_name: validated(
    azureSubscriptionName,
    z.string().max(80, 'String should have at most 80 characters')
  ),
});

export const ContextManagerSchema = z
  .object({
    selected: z.string().nullable(),
    contexts: z.record(ContextSchema),
  })
  .superRefine((value, ctx) => {
    if (value.selected !== null && !(value.selected in value.contexts)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['selected'],
        message: `Context '${value.selected}' is not defined.`,
      });
    }
  });

// ============================================================
// SHM and SRE configuration
// ============================================================

export const DATABASE_SYSTEMS = ['microsoftsqlserver', 'postgresql'] as const;
export const SOFTWARE_PACKAGE_CATEGORIES = ['any', 'pre-approved', 'none'] as const;

export const AzureSectionSchema = z.object({
  subscription_id: validated(aadGuid),
  tenant_id: validated(aadGuid),
});

export const SHMSectionSchema = z.object({
  entra_tenant_id: validated(aadGuid),
  fqdn: validated(fqdn),
});

export const RemoteDesktopSectionSchema = z.object({
  allow_copy: z.boolean().default(false),
  allow_paste: z.boolean().default(false),
});

export const SRESectionSchema = z.object({
  admin_email_address: validated(emailAddress),
  admin_ip_addresses: z.array(validated(ipAddress)).default([]),
  databases: unique(z.enum(DATABASE_SYSTEMS)).default([]),
  data_provider_ip_addresses: z.array(validated(ipAddress)).default([]),
  remote_desktop: RemoteDesktopSectionSchema.default({}),
  research_user_ip_addresses: z.array(validated(ipAddress)).default([]),
  software_packages: z.enum(SOFTWARE_PACKAGE_CATEGORIES).default('none'),
  timezone: validated(timezone).default('Etc/UTC'),
  workspace_skus: z.array(validated(azureVmSku)).default([]),
});

export const SHMConfigSchema = z.object({
  azure: AzureSectionSchema,
  shm: SHMSectionSchema,
});

export const SREConfigSchema = z.object({
  azure: AzureSectionSchema,
  description: z.string().default(''),
  name: validated(configName),
  sre: SRESectionSchema,
});

// ============================================================
// Pulumi stack settings
// ============================================================

export const PulumiProjectSchema = z.object({
  stack_config: z.record(z.unknown()).default({}),
});

export const DSHPulumiConfigSchema = z.object({
  encrypted_key: z.string().nullable().default(null),
  projects: z.record(PulumiProjectSchema).default({}),
});

export type ContextSettings = z.infer<typeof ContextSchema>;
export type ContextManagerSettings = z.infer<typeof ContextManagerSchema>;
export type AzureSection = z.infer<typeof AzureSectionSchema>;
export type SHMSection = z.infer<typeof SHMSectionSchema>;
export type RemoteDesktopSection = z.infer<typeof RemoteDesktopSectionSchema>;
export type SRESection = z.infer<typeof SRESectionSchema>;
export type SHMConfigSettings = z.infer<typeof SHMConfigSchema>;
export type SREConfigSettings = z.infer<typeof SREConfigSchema>;
export type PulumiProject = z.infer<typeof PulumiProjectSchema>;
export type DSHPulumiConfigSettings = z.infer<typeof DSHPulumiConfigSchema>;
export type DatabaseSystem = (typeof DATABASE_SYSTEMS)[number];
export type SoftwarePackageCategory = (typeof SOFTWARE_PACKAGE_CATEGORIES)[number];
