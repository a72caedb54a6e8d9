import { sreAllowlist, trafficFilterConfiguration } from '../src/infrastructure/common/networking';

describe('trafficFilterConfiguration', () => {
  const config = trafficFilterConfiguration('10.1.0.0/16', 'none');

  test('writes one allowed domain per line, matching subdomains', () => {
    const lines = config.allowlist.split('\n');
    expect(lines).toHaveLength(sreAllowlist('none').length + 1);
    expect(lines[0]).toBe('.clamav.net');
    expect(lines).toContain('.msauth.net');
    expect(lines[lines.length - 1]).toBe('');
  });

  test('limits the proxy to the SRE network', () => {
    expect(config.squidConf).toContain('acl sre_all src 10.1.0.0/16\n');
  });

  test('reads allowed domains from the mounted allowlist', () => {
    expect(config.squidConf).toContain('acl allowed_domains dstdomain "/etc/squid/allowlist.txt"\n');
    expect(config.squidConf).not.toContain('clamav.net');
  });

  test('adds package repositories when packages are allowed', () => {
    expect(config.allowlist).not.toContain('pypi.org');
    const withPackages = trafficFilterConfiguration('10.1.0.0/16', 'any');
    expect(withPackages.allowlist.split('\n')).toContain('.pypi.org');
  });
});
