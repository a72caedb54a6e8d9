/**
 * Azure IPv4 Range
 *
 * A contiguous block of IPv4 addresses that is exactly one CIDR network,
 * from which smaller aligned subnets can be carved in order.
 */

import { DataSafeHavenIPRangeError } from './errors.js';
import { ipv4ToNumber, numberToIpv4, parseIpv4Network, prefixSize } from './ipv4.js';

// Azure keeps the network address, the next three addresses and the broadcast address
const AZURE_RESERVED_LEADING = 4;
const AZURE_RESERVED_TRAILING = 1;

function toNumber(address: string | number): number {
  return typeof address === 'number' ? address : ipv4ToNumber(address);
}

/**
 * Split [first, last] into the smallest list of CIDR blocks covering it
 */
export function summariseRange(first: number, last: number): Array<{ address: number; prefix: number }> {
  const networks: Array<{ address: number; prefix: number }> = [];
  let current = first;
  while (current <= last) {
    let prefix = 32;
    while (
      prefix > 0 &&
      current % prefixSize(prefix - 1) === 0 &&
      current + prefixSize(prefix - 1) - 1 <= last
    ) {
      prefix--;
    }
    networks.push({ address: current, prefix });
    current += prefixSize(prefix);
  }
  return networks;
}

export class AzureIPv4Range {
  readonly first: number;
  readonly last: number;
  readonly prefix: number;
  private readonly subnets: AzureIPv4Range[] = [];

  constructor(firstAddress: string | number, lastAddress: string | number) {
    this.first = toNumber(firstAddress);
    this.last = toNumber(lastAddress);
    if (this.last < this.first) {
      throw new DataSafeHavenIPRangeError(
        `Last address ${numberToIpv4(this.last)} comes before first address ${numberToIpv4(this.first)}.`
      );
    }
    const networks = summariseRange(this.first, this.last);
    const [network] = networks;
    if (networks.length !== 1 || !network) {
      throw new DataSafeHavenIPRangeError(`Found ${networks.length} networks when expecting one.`);
    }
    this.prefix = network.prefix;
  }

  static fromCidr(cidr: string): AzureIPv4Range {
    const network = parseIpv4Network(cidr);
    return new AzureIPv4Range(network.address, network.address + prefixSize(network.prefix) - 1);
  }

  get size(): number {
    return this.last - this.first + 1;
  }

  get cidr(): string {
    return `${numberToIpv4(this.first)}/${this.prefix}`;
  }

  get firstAddress(): string {
    return numberToIpv4(this.first);
  }

  get lastAddress(): string {
    return numberToIpv4(this.last);
  }

  /**
   * Host addresses that Azure lets resources use
   */
  available(): string[] {
    const addresses: string[] = [];
    for (let value = this.first + AZURE_RESERVED_LEADING; value <= this.last - AZURE_RESERVED_TRAILING; value++) {
      addresses.push(numberToIpv4(value));
    }
    return addresses;
  }

  /**
   * Every address in the range, including reserved ones
   */
  addresses(): string[] {
    const addresses: string[] = [];
    for (let value = this.first; value <= this.last; value++) {
      addresses.push(numberToIpv4(value));
    }
    return addresses;
  }

  contains(address: string): boolean {
    const value = ipv4ToNumber(address);
    return value >= this.first && value <= this.last;
  }

  overlaps(other: AzureIPv4Range): boolean {
    return this.first <= other.last && other.first <= this.last;
  }

  /**
   * Reserve the first free aligned block of the given size
   */
  nextSubnet(numberOfAddresses: number): AzureIPv4Range {
    if (!Number.isInteger(numberOfAddresses) || !Number.isInteger(Math.log2(numberOfAddresses))) {
      throw new DataSafeHavenIPRangeError(
        `Number of addresses '${numberOfAddresses}' must be a power of two.`
      );
    }
    for (let start = this.first; start + numberOfAddresses - 1 <= this.last; start += numberOfAddresses) {
      const candidate = new AzureIPv4Range(start, start + numberOfAddresses - 1);
      if (!this.subnets.some((subnet) => subnet.overlaps(candidate))) {
        this.subnets.push(candidate);
        return candidate;
      }
    }
    throw new DataSafeHavenIPRangeError('No more subnets available.');
  }

  toString(): string {
    return this.cidr;
  }
}
