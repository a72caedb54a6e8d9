/**
 * IPv4 arithmetic
 *
 * Addresses are handled as unsigned 32-bit integers so ranges can be
 * compared, aligned and carved with plain number operations.
 */

import { isIPv4 } from 'net';

export interface Ipv4Network {
  /** Network address as an unsigned integer */
  address: number;
  prefix: number;
}

export const IPV4_MAX = 0xffffffff;

export function ipv4ToNumber(address: string): number {
  if (!isIPv4(address)) {
    throw new Error(`'${address}' is not an IPv4 address.`);
  }
  return address
    .split('.')
    .reduce((total, octet) => total * 256 + Number(octet), 0);
}

export function numberToIpv4(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > IPV4_MAX) {
    throw new Error(`${value} is outside the IPv4 address space.`);
  }
  return [24, 16, 8, 0].map((shift) => String(Math.floor(value / 2 ** shift) % 256)).join('.');
}

/**
 * Number of addresses in a network with this prefix length
 */
export function prefixSize(prefix: number): number {
  return 2 ** (32 - prefix);
}

/**
 * Parse "a.b.c.d" or "a.b.c.d/n". A bare address is a /32.
 * Host bits must be zero.
 */
export function parseIpv4Network(value: string): Ipv4Network {
  const [addressPart, prefixPart, ...rest] = value.split('/');
  if (addressPart === undefined || rest.length > 0) {
    throw new Error(`'${value}' is not an IPv4 network.`);
  }
  const prefix = prefixPart === undefined ? 32 : Number(prefixPart);
  if (!/^\d{1,2}$/.test(prefixPart ?? '32') || prefix > 32) {
    throw new Error(`'${value}' has an invalid prefix length.`);
  }
  const address = ipv4ToNumber(addressPart);
  if (address % prefixSize(prefix) !== 0) {
    throw new Error(`'${value}' has host bits set.`);
  }
  return { address, prefix };
}

export function formatIpv4Network(network: Ipv4Network): string {
  return `${numberToIpv4(network.address)}/${network.prefix}`;
}
