/**
 * Validators
 *
 * Each validator returns its input (normalised where noted) or throws an
 * Error whose message is shown to the user as-is.
 */

import { formatIpv4Network, parseIpv4Network } from './ipv4.js';

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const LOCATION_PATTERN = /^[a-z]+[0-9]?[a-z]*$/;
const SUBSCRIPTION_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9\- ]*[a-zA-Z0-9]$/;
const VM_SKU_PATTERN = /^(Standard|Basic)_\w+$/;
const CONFIG_NAME_PATTERN = /^[a-z0-9][a-z0-9 -]*[a-z0-9]$/i;
const FQDN_LABEL = '(?!-)[a-z0-9-]{1,63}(?<!-)';
const FQDN_PATTERN = new RegExp(`^(?:${FQDN_LABEL}\\.)+${FQDN_LABEL}\\.?$`, 'i');
const EMAIL_LOCAL_PATTERN = /^[a-z0-9._%+-]+$/i;

export function aadGuid(value: string): string {
  if (!GUID_PATTERN.test(value)) {
    throw new Error("Expected GUID, for example 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd'.");
  }
  return value;
}

export function azureLocation(value: string): string {
  if (!LOCATION_PATTERN.test(value)) {
    throw new Error("Expected valid Azure location, for example 'uksouth'.");
  }
  return value;
}

export function azureSubscriptionName(value: string): string {
  if (!SUBSCRIPTION_NAME_PATTERN.test(value)) {
    throw new Error(
      'Azure subscription names can only contain alphanumeric characters, spaces and particular special characters.'
    );
  }
  return value;
}

export function azureVmSku(value: string): string {
  if (!VM_SKU_PATTERN.test(value)) {
    throw new Error("Expected valid Azure VM SKU, for example 'Standard_D2s_v4'.");
  }
  return value;
}

export function configName(value: string): string {
  if (!CONFIG_NAME_PATTERN.test(value)) {
    throw new Error(
      'DSH config names can only contain alphanumeric characters, spaces and hyphens.\n' +
        'They must start and end with alphanumeric characters.'
    );
  }
  return value;
}

export function fqdn(value: string): string {
  if (value.length > 254 || !FQDN_PATTERN.test(value)) {
    throw new Error("Expected valid fully qualified domain name, for example 'example.com'.");
  }
  return value;
}

export function emailAddress(value: string): string {
  const at = value.lastIndexOf('@');
  const local = value.slice(0, at);
  const domain = value.slice(at + 1);
  if (at < 1 || !EMAIL_LOCAL_PATTERN.test(local) || !FQDN_PATTERN.test(domain)) {
    throw new Error("Expected valid email address, for example 'sherlock@holmes.com'.");
  }
  return value;
}

/**
 * Accept an address or network and return it in CIDR form (1.2.3.4 -> 1.2.3.4/32)
 */
export function ipAddress(value: string): string {
  try {
    return formatIpv4Network(parseIpv4Network(value.trim()));
  } catch {
    throw new Error("Expected valid IPv4 address, for example '1.1.1.1'.");
  }
}

export function timezone(value: string): string {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: value });
  } catch {
    throw new Error("Expected valid timezone, for example 'Europe/London'.");
  }
  return value;
}

/**
 * Require every item to be distinct, comparing by key (the item itself by default)
 */
export function uniqueList<T>(items: T[], key: (item: T) => unknown = (item) => item): T[] {
  const seen = new Set(items.map(key));
  if (seen.size !== items.length) {
    throw new Error('All items must be unique.');
  }
  return items;
}
