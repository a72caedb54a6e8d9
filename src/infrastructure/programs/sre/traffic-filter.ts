/**
 * SRE traffic filter
 *
 * A Squid proxy in a container group on its own subnet. Outbound traffic
 * from the SRE is routed through it and only allowlisted domains pass.
 */

import * as pulumi from '@pulumi/pulumi';
import * as containerinstance from '@pulumi/azure-native/containerinstance';
import * as network from '@pulumi/azure-native/network';

import type { SoftwarePackageCategory } from '../../../config/schema.js';
import { b64encode } from '../../../utils/naming.js';
import { Ports } from '../../common/enums.js';
import {
  SQUID_ALLOWLIST_FILENAME,
  SQUID_CONFIG_DIRECTORY,
  trafficFilterConfiguration,
} from '../../common/networking.js';
import { containerGroupIpAddress } from '../transformations.js';

export const SQUID_IMAGE = 'ubuntu/squid:5.2-22.04_beta';

export interface SRETrafficFilterProps {
  location: string;
  resourceGroupName: pulumi.Input<string>;
  routeTableName: pulumi.Input<string>;
  softwarePackages: SoftwarePackageCategory;
  sreAddressRange: string;
  subnetId: pulumi.Input<string>;
}

export class SRETrafficFilterComponent extends pulumi.ComponentResource {
  readonly ipAddress: pulumi.Output<string>;

  constructor(
    name: string,
    stackName: string,
    props: SRETrafficFilterProps,
    tags: Record<string, string>,
    opts?: pulumi.ComponentResourceOptions
  ) {
    super('dsh:sre:TrafficFilterComponent', name, {}, opts);
    const childOpts = { parent: this };
    const configuration = trafficFilterConfiguration(props.sreAddressRange, props.softwarePackages);
    const port = Number(Ports.SQUID);

    const containerGroup = new containerinstance.ContainerGroup(
      `${name}_container_group`,
      {
        containerGroupName: `${stackName}-container-group-traffic-filter`,
        containers: [
          {
            image: SQUID_IMAGE,
            name: 'squid',
            ports: [{ port, protocol: 'TCP' }],
            resources: { requests: { cpu: 1, memoryInGB: 1 } },
            volumeMounts: [{ mountPath: SQUID_CONFIG_DIRECTORY, name: 'squid-config', readOnly: true }],
          },
        ],
        ipAddress: {
          ports: [{ port, protocol: 'TCP' }],
          type: 'Private',
        },
        location: props.location,
        osType: 'Linux',
        resourceGroupName: props.resourceGroupName,
        restartPolicy: 'Always',
        sku: 'Standard',
        subnetIds: [{ id: props.subnetId }],
        volumes: [
          {
            name: 'squid-config',
            secret: {
              [SQUID_ALLOWLIST_FILENAME]: b64encode(configuration.allowlist),
              'squid.conf': b64encode(configuration.squidConf),
            },
          },
        ],
        tags,
      },
      childOpts
    );

    this.ipAddress = containerGroupIpAddress(containerGroup);

    new network.Route(
      `${name}_route_via_traffic_filter`,
      {
        addressPrefix: '0.0.0.0/0',
        nextHopIpAddress: this.ipAddress,
        nextHopType: 'VirtualAppliance',
        resourceGroupName: props.resourceGroupName,
        routeName: 'ViaTrafficFilter',
        routeTableName: props.routeTableName,
      },
      childOpts
    );

    this.registerOutputs({ ipAddress: this.ipAddress });
  }
}
