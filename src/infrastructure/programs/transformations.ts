/**
 * Helpers for reading values out of Pulumi resource outputs
 */

import * as pulumi from '@pulumi/pulumi';
import type * as containerinstance from '@pulumi/azure-native/containerinstance';
import type * as network from '@pulumi/azure-native/network';

/**
 * ID of a named subnet declared inline on a virtual network
 */
export function subnetId(vnet: network.VirtualNetwork, subnetName: string): pulumi.Output<string> {
  return vnet.subnets.apply((subnets) => {
    const id = subnets?.find((subnet) => subnet.name === subnetName)?.id;
    if (!id) {
      throw new Error(`Virtual network has no subnet named '${subnetName}'.`);
    }
    return id;
  });
}

export function containerGroupIpAddress(group: containerinstance.ContainerGroup): pulumi.Output<string> {
  return group.ipAddress.apply((address) => {
    if (!address?.ip) {
      throw new Error('Container group has no IP address.');
    }
    return address.ip;
  });
}
