/**
 * Tests for IPv4 arithmetic and AzureIPv4Range
 */
import { formatIpv4Network, ipv4ToNumber, numberToIpv4, parseIpv4Network } from '../src/utils/ipv4';
import { AzureIPv4Range, summariseRange } from '../src/utils/ip-range';
import { DataSafeHavenIPRangeError } from '../src/utils/errors';

describe('ipv4', () => {
  test('converts between dotted quads and numbers', () => {
    expect(ipv4ToNumber('10.1.2.3')).toBe(167838211);
    expect(numberToIpv4(167838211)).toBe('10.1.2.3');
    expect(numberToIpv4(0xffffffff)).toBe('255.255.255.255');
  });

  test('parses networks and bare addresses', () => {
    expect(parseIpv4Network('10.0.0.0/8')).toEqual({ address: 167772160, prefix: 8 });
    expect(formatIpv4Network(parseIpv4Network('1.2.3.4'))).toBe('1.2.3.4/32');
  });

  test('rejects host bits and bad prefixes', () => {
    expect(() => parseIpv4Network('10.0.0.1/24')).toThrow("'10.0.0.1/24' has host bits set.");
    expect(() => parseIpv4Network('10.0.0.0/x')).toThrow("'10.0.0.0/x' has an invalid prefix length.");
    expect(() => ipv4ToNumber('10.0.0')).toThrow("'10.0.0' is not an IPv4 address.");
  });
});

describe('summariseRange', () => {
  test('splits an unaligned range into CIDR blocks', () => {
    const networks = summariseRange(ipv4ToNumber('10.0.0.0'), ipv4ToNumber('10.0.0.11'));
    expect(networks.map(formatIpv4Network)).toEqual(['10.0.0.0/29', '10.0.0.8/30']);
  });
});

describe('AzureIPv4Range', () => {
  test('describes a single network', () => {
    const range = new AzureIPv4Range('10.0.0.0', '10.0.0.255');
    expect(range.cidr).toBe('10.0.0.0/24');
    expect(range.prefix).toBe(24);
    expect(range.size).toBe(256);
    expect(range.firstAddress).toBe('10.0.0.0');
    expect(range.lastAddress).toBe('10.0.0.255');
    expect(String(range)).toBe('10.0.0.0/24');
  });

  test('builds from CIDR notation', () => {
    const range = AzureIPv4Range.fromCidr('192.168.0.0/16');
    expect(range.lastAddress).toBe('192.168.255.255');
  });

  test('rejects ranges that are not one network', () => {
    expect(() => new AzureIPv4Range('10.0.0.0', '10.0.0.11')).toThrow(
      new DataSafeHavenIPRangeError('Found 2 networks when expecting one.')
    );
  });

  test('rejects reversed ranges', () => {
    expect(() => new AzureIPv4Range('10.0.0.8', '10.0.0.0')).toThrow(
      'Last address 10.0.0.0 comes before first address 10.0.0.8.'
    );
  });

  test('skips the addresses Azure reserves', () => {
    const range = new AzureIPv4Range('10.0.0.0', '10.0.0.7');
    expect(range.available()).toEqual(['10.0.0.4', '10.0.0.5', '10.0.0.6']);
  });

  test('contains and overlaps', () => {
    const range = AzureIPv4Range.fromCidr('10.0.0.0/24');
    expect(range.contains('10.0.0.200')).toBe(true);
    expect(range.contains('10.0.1.0')).toBe(false);
    expect(range.overlaps(AzureIPv4Range.fromCidr('10.0.0.128/25'))).toBe(true);
    expect(range.overlaps(AzureIPv4Range.fromCidr('10.0.1.0/24'))).toBe(false);
  });

  test('lists every address including reserved ones', () => {
    expect(AzureIPv4Range.fromCidr('10.0.0.4/30').addresses()).toEqual([
      '10.0.0.4',
      '10.0.0.5',
      '10.0.0.6',
      '10.0.0.7',
    ]);
  });

  describe('nextSubnet', () => {
    test('carves aligned blocks in order, filling gaps', () => {
      const range = AzureIPv4Range.fromCidr('10.0.0.0/24');
      expect(range.nextSubnet(8).cidr).toBe('10.0.0.0/29');
      expect(range.nextSubnet(64).cidr).toBe('10.0.0.64/26');
      expect(range.nextSubnet(8).cidr).toBe('10.0.0.8/29');
    });

    test('requires a power of two', () => {
      expect(() => AzureIPv4Range.fromCidr('10.0.0.0/24').nextSubnet(12)).toThrow(
        "Number of addresses '12' must be a power of two."
      );
    });

    test('fails when the range is used up', () => {
      const range = AzureIPv4Range.fromCidr('10.0.0.0/29');
      range.nextSubnet(8);
      expect(() => range.nextSubnet(8)).toThrow('No more subnets available.');
    });
  });
});
