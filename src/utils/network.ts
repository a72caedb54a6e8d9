/**
 * Network Helpers
 *
 * Look up the caller's public IP address and compare it with allowed lists.
 */

import { DataSafeHavenValueError } from './errors.js';
import { ipAddress } from './validators.js';

const IP_LOOKUP_URL = 'https://api.ipify.org';

/**
 * The parts of a fetch Response that the lookups read
 */
export interface TextResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type TextFetcher = (url: string) => Promise<TextResponse>;

export interface IpLookupOptions {
  /** Return 1.2.3.4/32 instead of 1.2.3.4 */
  asCidr?: boolean;
}

export async function currentIpAddress(
  options: IpLookupOptions = {},
  fetcher: TextFetcher = fetch
): Promise<string> {
  try {
    const response = await fetcher(IP_LOOKUP_URL);
    if (!response.ok) {
      throw new Error(`Lookup returned HTTP ${response.status}.`);
    }
    const address = (await response.text()).trim();
    const cidr = ipAddress(address);
    return options.asCidr ? cidr : address;
  } catch (e) {
    throw new DataSafeHavenValueError('Could not determine IP address.', { cause: e });
  }
}

/**
 * Whether the caller's address is one of the given addresses or networks
 */
export async function ipAddressInList(
  addresses: string[],
  fetcher: TextFetcher = fetch
): Promise<boolean> {
  const current = await currentIpAddress({ asCidr: true }, fetcher);
  return addresses.map((address) => ipAddress(address)).includes(current);
}
