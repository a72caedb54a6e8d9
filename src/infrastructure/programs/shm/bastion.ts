/**
 * SHM bastion host, the only route for admins onto SHM and SRE machines
 */

import * as pulumi from '@pulumi/pulumi';
import * as network from '@pulumi/azure-native/network';

export interface SHMBastionProps {
  location: string;
  resourceGroupName: pulumi.Input<string>;
  subnetId: pulumi.Input<string>;
}

export class SHMBastionComponent extends pulumi.ComponentResource {
  readonly bastionHostName: pulumi.Output<string>;

  constructor(
    name: string,
    stackName: string,
    props: SHMBastionProps,
    tags: Record<string, string>,
    opts?: pulumi.ComponentResourceOptions
  ) {
    super('dsh:shm:BastionComponent', name, {}, opts);
    const childOpts = { parent: this };

    const publicIp = new network.PublicIPAddress(
      `${name}_pip_bastion`,
      {
        location: props.location,
        publicIpAddressName: `${stackName}-pip-bastion`,
        publicIPAllocationMethod: 'Static',
        resourceGroupName: props.resourceGroupName,
        sku: { name: 'Standard' },
        tags,
      },
      childOpts
    );

    const bastionHost = new network.BastionHost(
      `${name}_bastion_host`,
      {
        bastionHostName: `${stackName}-bas`,
        ipConfigurations: [
          {
            name: `${stackName}-bas-ipcfg`,
            privateIPAllocationMethod: 'Dynamic',
            publicIPAddress: { id: publicIp.id },
            subnet: { id: props.subnetId },
          },
        ],
        location: props.location,
        resourceGroupName: props.resourceGroupName,
        tags,
      },
      childOpts
    );

    this.bastionHostName = bastionHost.name;
    this.registerOutputs({ bastionHostName: this.bastionHostName });
  }
}
