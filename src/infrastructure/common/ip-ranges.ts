/**
 * IP Ranges
 *
 * Fixed address plans for the SHM and SRE virtual networks. Subnets are
 * carved in declaration order, so changing the order moves every subnet
 * declared after the change.
 */

import { DataSafeHavenIPRangeError } from '../../utils/errors.js';
import { AzureIPv4Range } from '../../utils/ip-range.js';

export const MAX_SRE_INDEX = 255;

export class SHMIpRanges {
  readonly vnet = new AzureIPv4Range('10.0.0.0', '10.0.7.255');
  readonly bastion = this.vnet.nextSubnet(64);
  readonly firewall = this.vnet.nextSubnet(64);
  readonly firewallManagement = this.vnet.nextSubnet(64);
  readonly monitoring = this.vnet.nextSubnet(32);
  readonly updateServers = this.vnet.nextSubnet(32);
  readonly identityServers = this.vnet.nextSubnet(8);
}

export class SREIpRanges {
  readonly vnet: AzureIPv4Range;
  readonly applicationGateway: AzureIPv4Range;
  readonly aptProxyServer: AzureIPv4Range;
  readonly clamavMirror: AzureIPv4Range;
  readonly dataConfiguration: AzureIPv4Range;
  readonly dataPrivate: AzureIPv4Range;
  readonly firewall: AzureIPv4Range;
  readonly firewallManagement: AzureIPv4Range;
  readonly guacamoleContainers: AzureIPv4Range;
  readonly guacamoleContainersSupport: AzureIPv4Range;
  readonly identityContainers: AzureIPv4Range;
  readonly monitoring: AzureIPv4Range;
  readonly userServicesContainers: AzureIPv4Range;
  readonly userServicesContainersSupport: AzureIPv4Range;
  readonly userServicesDatabases: AzureIPv4Range;
  readonly userServicesSoftwareRepositories: AzureIPv4Range;
  readonly workspaces: AzureIPv4Range;

  constructor(readonly index: number) {
    if (!Number.isInteger(index) || index < 1 || index > MAX_SRE_INDEX) {
      throw new DataSafeHavenIPRangeError(
        `SRE index '${index}' must be an integer between 1 and ${MAX_SRE_INDEX}.`
      );
    }
    this.vnet = new AzureIPv4Range(`10.${index}.0.0`, `10.${index}.255.255`);
    this.applicationGateway = this.vnet.nextSubnet(256);
    this.aptProxyServer = this.vnet.nextSubnet(8);
    this.clamavMirror = this.vnet.nextSubnet(8);
    this.dataConfiguration = this.vnet.nextSubnet(8);
    this.dataPrivate = this.vnet.nextSubnet(8);
    this.firewall = this.vnet.nextSubnet(64);
    this.firewallManagement = this.vnet.nextSubnet(64);
    this.guacamoleContainers = this.vnet.nextSubnet(8);
    this.guacamoleContainersSupport = this.vnet.nextSubnet(8);
    this.identityContainers = this.vnet.nextSubnet(8);
    this.monitoring = this.vnet.nextSubnet(32);
    this.userServicesContainers = this.vnet.nextSubnet(8);
    this.userServicesContainersSupport = this.vnet.nextSubnet(8);
    this.userServicesDatabases = this.vnet.nextSubnet(8);
    this.userServicesSoftwareRepositories = this.vnet.nextSubnet(8);
    this.workspaces = this.vnet.nextSubnet(256);
  }
}
