import * as pulumi from '@pulumi/pulumi';
import type { PulumiFn } from '@pulumi/pulumi/automation';

import type { SHMConfig } from '../../../config/shm-config.js';
import type { SREConfig } from '../../../config/sre-config.js';
import type { Context } from '../../../context/context.js';
import { sanitiseSreName } from '../../../utils/naming.js';
import { SREIpRanges } from '../../common/ip-ranges.js';
import { SRE_SECRET_NAMES } from '../secrets.js';
import { SREDataComponent } from './data.js';
import { SRENetworkingComponent } from './networking.js';
import { SRETrafficFilterComponent } from './traffic-filter.js';

export interface SREProgramOptions {
  context: Context;
  shmConfig: SHMConfig;
  sreConfig: SREConfig;
  /** Allocated once per SRE and kept in its stack config */
  sreIndex: number;
  shmStackName: string;
  stackName: string;
}

/**
 * Pulumi program for one Secure Research Environment
 */
export function sreProgram(options: SREProgramOptions): PulumiFn {
  const { context, shmConfig, sreConfig, stackName } = options;
  return async () => {
    const stackConfig = new pulumi.Config();
    const ranges = new SREIpRanges(options.sreIndex);
    const tags = { ...context.tags, sre_name: sreConfig.name };
    const location = context.location;
    const { sre } = sreConfig;

    const networking = new SRENetworkingComponent(
      'sre_networking',
      stackName,
      {
        location,
        ranges,
        researchUserIps: sre.research_user_ip_addresses,
        shmFqdn: shmConfig.shm.fqdn,
        shmStackName: options.shmStackName,
        sreSubdomain: sanitiseSreName(sreConfig.name),
      },
      tags
    );

    const secrets: Record<string, pulumi.Output<string>> = {};
    for (const secretName of SRE_SECRET_NAMES) {
      secrets[secretName] = stackConfig.requireSecret(secretName);
    }

    const data = new SREDataComponent(
      'sre_data',
      stackName,
      {
        adminGroupId: context.adminGroupId,
        dataProviderIps: sre.data_provider_ip_addresses,
        location,
        secrets,
        shmName: context.shmName,
        sreName: sreConfig.name,
        subnetDataPrivateId: networking.subnetIds.dataPrivate,
        tenantId: sreConfig.azure.tenant_id,
        virtualNetworkId: networking.virtualNetworkId,
      },
      tags
    );

    const trafficFilter = new SRETrafficFilterComponent(
      'sre_traffic_filter',
      stackName,
      {
        location,
        resourceGroupName: networking.resourceGroupName,
        routeTableName: networking.routeTableName,
        softwarePackages: sre.software_packages,
        sreAddressRange: ranges.vnet.cidr,
        subnetId: networking.subnetIds.trafficFilter,
      },
      tags
    );

    return {
      dataKeyVaultName: data.keyVaultName,
      dataStorageAccountName: data.storageAccountName,
      networkingResourceGroupName: networking.resourceGroupName,
      sreFqdn: networking.sreFqdn,
      trafficFilterIpAddress: trafficFilter.ipAddress,
      virtualNetworkName: networking.virtualNetworkName,
    };
  };
}
