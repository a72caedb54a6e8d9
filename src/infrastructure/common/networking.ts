/**
 * Permitted Domains
 *
 * Outbound domains that the SRE traffic filter lets through, grouped by
 * what they are needed for.
 */

import * as fs from 'fs';
import { z } from 'zod';

import { renderTemplate, resourcePath } from '../../utils/templates.js';
import type { SoftwarePackageCategory } from '../../config/schema.js';

export const PERMITTED_DOMAIN_CATEGORIES = [
  'apt_repositories',
  'clamav_updates',
  'cran',
  'microsoft_graph_api',
  'microsoft_identity',
  'microsoft_login',
  'pypi',
  'ubuntu_keyserver',
] as const;

export type PermittedDomainCategory = (typeof PERMITTED_DOMAIN_CATEGORIES)[number];

const PermittedDomainsSchema = z.record(z.enum(PERMITTED_DOMAIN_CATEGORIES), z.array(z.string()));

let cache: Partial<Record<PermittedDomainCategory, string[]>> | null = null;

function loadPermittedDomains(): Partial<Record<PermittedDomainCategory, string[]>> {
  if (!cache) {
    const raw: unknown = JSON.parse(fs.readFileSync(resourcePath('permitted-domains.json'), 'utf8'));
    cache = PermittedDomainsSchema.parse(raw);
  }
  return cache;
}

/**
 * Sorted, de-duplicated domains for the given categories
 */
export function permittedDomains(categories: readonly PermittedDomainCategory[]): string[] {
  const domains = loadPermittedDomains();
  return [...new Set(categories.flatMap((category) => domains[category] ?? []))].sort();
}

const ALWAYS_ALLOWED: PermittedDomainCategory[] = [
  'clamav_updates',
  'microsoft_graph_api',
  'microsoft_identity',
  'microsoft_login',
];

const SOFTWARE_REPOSITORIES: PermittedDomainCategory[] = ['apt_repositories', 'cran', 'pypi', 'ubuntu_keyserver'];

export function sreAllowlist(softwarePackages: SoftwarePackageCategory): string[] {
  return permittedDomains(
    softwarePackages === 'none' ? ALWAYS_ALLOWED : [...ALWAYS_ALLOWED, ...SOFTWARE_REPOSITORIES]
  );
}

export const SQUID_CONFIG_DIRECTORY = '/etc/squid';
export const SQUID_ALLOWLIST_FILENAME = 'allowlist.txt';

export interface TrafficFilterConfiguration {
  allowlist: string;
  squidConf: string;
}

/**
 * Squid configuration and the allowlist file that it reads from the same
 * directory. A leading dot lets Squid match subdomains too.
 */
export function trafficFilterConfiguration(
  sreAddressRange: string,
  softwarePackages: SoftwarePackageCategory
): TrafficFilterConfiguration {
  return {
    allowlist: sreAllowlist(softwarePackages)
      .map((domain) => `.${domain}\n`)
      .join(''),
    squidConf: renderTemplate('traffic_filter/squid.mustache.conf', {
      allowlist_path: `${SQUID_CONFIG_DIRECTORY}/${SQUID_ALLOWLIST_FILENAME}`,
      iprange_all: sreAddressRange,
    }),
  };
}
