/**
 * Names for SRE resources that must be globally unique and short, such as
 * storage accounts (24 lowercase alphanumerics) and key vaults.
 */

import { AzureIPv4Range } from '../../utils/ip-range.js';
import { alphanumeric, truncateTokens } from '../../utils/naming.js';

// Storage firewalls reject /31 and /32 networks
const SMALLEST_STORAGE_PREFIX = 30;

export function sreUniqueName(shmName: string, sreName: string, suffix: string, maxLength = 24): string {
  const tokens = [alphanumeric(shmName).toLowerCase(), alphanumeric(sreName).toLowerCase()];
  return `${truncateTokens(tokens, maxLength - suffix.length).join('')}${suffix}`;
}

/**
 * Storage firewall entries for a network: the network itself, or its
 * individual addresses when it is too small to be accepted as a range
 */
export function storageIpRules(cidr: string): string[] {
  const range = AzureIPv4Range.fromCidr(cidr);
  return range.prefix > SMALLEST_STORAGE_PREFIX ? range.addresses() : [range.cidr];
}
