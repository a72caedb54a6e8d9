import type { PulumiFn } from '@pulumi/pulumi/automation';

import type { SHMConfig } from '../../../config/shm-config.js';
import type { Context } from '../../../context/context.js';
import { SHMBastionComponent } from './bastion.js';
import { SHMDataComponent } from './data.js';
import { SHMNetworkingComponent } from './networking.js';

export interface SHMProgramOptions {
  context: Context;
  config: SHMConfig;
  stackName: string;
}

/**
 * Pulumi program for the Safe Haven Management environment
 */
export function shmProgram({ context, config, stackName }: SHMProgramOptions): PulumiFn {
  return async () => {
    const tags = context.tags;
    const location = context.location;

    const networking = new SHMNetworkingComponent(
      'shm_networking',
      stackName,
      { fqdn: config.shm.fqdn, location },
      tags
    );

    const bastion = new SHMBastionComponent(
      'shm_bastion',
      stackName,
      {
        location,
        resourceGroupName: networking.resourceGroupName,
        subnetId: networking.bastionSubnetId,
      },
      tags
    );

    // Key vault names are limited to 24 characters
    const data = new SHMDataComponent(
      'shm_data',
      stackName,
      {
        adminGroupId: context.adminGroupId,
        keyVaultName: `shm-${context.shmName.slice(0, 9)}-kv-data`,
        location,
        tenantId: config.azure.tenant_id,
      },
      tags
    );

    return {
      bastionHostName: bastion.bastionHostName,
      dnsNameServers: networking.dnsNameServers,
      keyVaultName: data.keyVaultName,
      networkingResourceGroupName: networking.resourceGroupName,
      virtualNetworkName: networking.virtualNetworkName,
    };
  };
}
