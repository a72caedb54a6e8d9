/**
 * Tests for the SHM and SRE address plans
 */
import { SHMIpRanges, SREIpRanges } from '../src/infrastructure/common/ip-ranges';

describe('SHMIpRanges', () => {
  test('carves the management network', () => {
    const ranges = new SHMIpRanges();
    expect(ranges.vnet.cidr).toBe('10.0.0.0/21');
    expect(ranges.bastion.cidr).toBe('10.0.0.0/26');
    expect(ranges.firewall.cidr).toBe('10.0.0.64/26');
    expect(ranges.firewallManagement.cidr).toBe('10.0.0.128/26');
    expect(ranges.monitoring.cidr).toBe('10.0.0.192/27');
    expect(ranges.updateServers.cidr).toBe('10.0.0.224/27');
    expect(ranges.identityServers.cidr).toBe('10.0.1.0/29');
  });
});

describe('SREIpRanges', () => {
  test('carves subnets in a fixed order', () => {
    const ranges = new SREIpRanges(1);
    expect(ranges.vnet.cidr).toBe('10.1.0.0/16');
    expect(ranges.applicationGateway.cidr).toBe('10.1.0.0/24');
    expect(ranges.aptProxyServer.cidr).toBe('10.1.1.0/29');
    expect(ranges.clamavMirror.cidr).toBe('10.1.1.8/29');
    expect(ranges.dataConfiguration.cidr).toBe('10.1.1.16/29');
    expect(ranges.dataPrivate.cidr).toBe('10.1.1.24/29');
    expect(ranges.firewall.cidr).toBe('10.1.1.64/26');
    expect(ranges.firewallManagement.cidr).toBe('10.1.1.128/26');
    expect(ranges.guacamoleContainers.cidr).toBe('10.1.1.32/29');
    expect(ranges.guacamoleContainersSupport.cidr).toBe('10.1.1.40/29');
    expect(ranges.identityContainers.cidr).toBe('10.1.1.48/29');
    expect(ranges.monitoring.cidr).toBe('10.1.1.192/27');
    expect(ranges.userServicesContainers.cidr).toBe('10.1.1.56/29');
    expect(ranges.userServicesContainersSupport.cidr).toBe('10.1.1.224/29');
    expect(ranges.userServicesDatabases.cidr).toBe('10.1.1.232/29');
    expect(ranges.userServicesSoftwareRepositories.cidr).toBe('10.1.1.240/29');
    expect(ranges.workspaces.cidr).toBe('10.1.2.0/24');
  });

  test('uses the index as the second octet', () => {
    const ranges = new SREIpRanges(255);
    expect(ranges.vnet.cidr).toBe('10.255.0.0/16');
    expect(ranges.workspaces.cidr).toBe('10.255.2.0/24');
  });

  test.each([0, 256, 1.5])('rejects index %p', (index) => {
    expect(() => new SREIpRanges(index)).toThrow(`SRE index '${index}' must be an integer between 1 and 255.`);
  });
});
