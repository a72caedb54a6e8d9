/**
 * SHM networking: virtual network, bastion NSG and the public DNS zone
 * that SRE zones are delegated from.
 */

import * as pulumi from '@pulumi/pulumi';
import * as network from '@pulumi/azure-native/network';
import * as resources from '@pulumi/azure-native/resources';

import { SHMIpRanges } from '../../common/ip-ranges.js';
import { shmBastionRules } from '../../common/rules.js';
import { subnetId } from '../transformations.js';

export interface SHMNetworkingProps {
  fqdn: string;
  location: string;
}

export const SHM_BASTION_SUBNET_NAME = 'AzureBastionSubnet';

export function shmNetworkingResourceGroupName(stackName: string): string {
  return `${stackName}-rg-networking`;
}

export class SHMNetworkingComponent extends pulumi.ComponentResource {
  readonly resourceGroupName: pulumi.Output<string>;
  readonly bastionSubnetId: pulumi.Output<string>;
  readonly dnsZoneName: pulumi.Output<string>;
  readonly dnsNameServers: pulumi.Output<string[]>;
  readonly virtualNetworkName: pulumi.Output<string>;

  constructor(
    name: string,
    stackName: string,
    props: SHMNetworkingProps,
    tags: Record<string, string>,
    opts?: pulumi.ComponentResourceOptions
  ) {
    super('dsh:shm:NetworkingComponent', name, {}, opts);
    const childOpts = { parent: this };
    const ranges = new SHMIpRanges();

    const resourceGroup = new resources.ResourceGroup(
      `${name}_resource_group`,
      {
        location: props.location,
        resourceGroupName: shmNetworkingResourceGroupName(stackName),
        tags,
      },
      childOpts
    );

    const nsgBastion = new network.NetworkSecurityGroup(
      `${name}_nsg_bastion`,
      {
        location: props.location,
        networkSecurityGroupName: `${stackName}-nsg-bastion`,
        resourceGroupName: resourceGroup.name,
        securityRules: shmBastionRules({ ranges }),
        tags,
      },
      childOpts
    );

    const vnet = new network.VirtualNetwork(
      `${name}_vnet`,
      {
        addressSpace: { addressPrefixes: [ranges.vnet.cidr] },
        location: props.location,
        resourceGroupName: resourceGroup.name,
        subnets: [
          {
            name: SHM_BASTION_SUBNET_NAME,
            addressPrefix: ranges.bastion.cidr,
            networkSecurityGroup: { id: nsgBastion.id },
          },
          { name: 'MonitoringSubnet', addressPrefix: ranges.monitoring.cidr },
          { name: 'UpdateServersSubnet', addressPrefix: ranges.updateServers.cidr },
          { name: 'IdentityServersSubnet', addressPrefix: ranges.identityServers.cidr },
        ],
        virtualNetworkName: `${stackName}-vnet`,
        tags,
      },
      childOpts
    );

    const dnsZone = new network.Zone(
      `${name}_dns_zone`,
      {
        location: 'Global',
        resourceGroupName: resourceGroup.name,
        zoneName: props.fqdn,
        zoneType: 'Public',
        tags,
      },
      childOpts
    );

    this.resourceGroupName = resourceGroup.name;
    this.bastionSubnetId = subnetId(vnet, SHM_BASTION_SUBNET_NAME);
    this.dnsZoneName = dnsZone.name;
    this.dnsNameServers = dnsZone.nameServers;
    this.virtualNetworkName = vnet.name;
    this.registerOutputs({
      dnsNameServers: this.dnsNameServers,
      virtualNetworkName: this.virtualNetworkName,
    });
  }
}
