import { currentIpAddress, ipAddressInList, type TextFetcher } from '../src/utils/network';

function respondWith(body: string, status = 200): TextFetcher {
  return async () => ({ ok: status < 400, status, text: async () => body });
}

describe('currentIpAddress', () => {
  test('returns the address reported by the lookup service', async () => {
    expect(await currentIpAddress({}, respondWith('203.0.113.7\n'))).toBe('203.0.113.7');
  });

  test('can return the address as a CIDR', async () => {
    expect(await currentIpAddress({ asCidr: true }, respondWith('203.0.113.7'))).toBe('203.0.113.7/32');
  });

  test('fails when the lookup fails', async () => {
    await expect(currentIpAddress({}, respondWith('', 503))).rejects.toThrow('Could not determine IP address.');
  });

  test('fails when the lookup returns something else', async () => {
    await expect(currentIpAddress({}, respondWith('<html></html>'))).rejects.toThrow(
      'Could not determine IP address.'
    );
  });
});

describe('ipAddressInList', () => {
  test('matches addresses given with or without a prefix', async () => {
    const fetcher = respondWith('203.0.113.7');
    expect(await ipAddressInList(['198.51.100.1', '203.0.113.7'], fetcher)).toBe(true);
    expect(await ipAddressInList(['203.0.113.7/32'], fetcher)).toBe(true);
    expect(await ipAddressInList(['198.51.100.1'], fetcher)).toBe(false);
  });
});
