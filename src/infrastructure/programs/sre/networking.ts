/**
 * SRE networking
 *
 * Virtual network carved from the SRE's IP ranges, NSGs for the subnets
 * that take user or data traffic, the route table that the traffic filter
 * adds its default route to, and a DNS zone delegated from the SHM zone.
 */

import * as pulumi from '@pulumi/pulumi';
import * as network from '@pulumi/azure-native/network';
import * as resources from '@pulumi/azure-native/resources';

import type { SREIpRanges } from '../../common/ip-ranges.js';
import {
  sreApplicationGatewayRules,
  sreDataPrivateRules,
  sreUserServicesDatabasesRules,
  sreWorkspacesRules,
  type SecurityRuleSpec,
} from '../../common/rules.js';
import { shmNetworkingResourceGroupName } from '../shm/networking.js';
import { subnetId } from '../transformations.js';

export const SRE_SUBNET_NAMES = {
  applicationGateway: 'ApplicationGatewaySubnet',
  dataPrivate: 'DataPrivateSubnet',
  trafficFilter: 'TrafficFilterSubnet',
  userServicesContainers: 'UserServicesContainersSubnet',
  userServicesDatabases: 'UserServicesDatabasesSubnet',
  workspaces: 'WorkspacesSubnet',
} as const;

const CONTAINER_GROUP_DELEGATION = {
  name: 'SubnetDelegationContainerGroups',
  serviceName: 'Microsoft.ContainerInstance/containerGroups',
};

export interface SRENetworkingProps {
  location: string;
  ranges: SREIpRanges;
  researchUserIps: string[];
  shmFqdn: string;
  shmStackName: string;
  /** DNS label of the SRE below the SHM domain */
  sreSubdomain: string;
}

export class SRENetworkingComponent extends pulumi.ComponentResource {
  readonly resourceGroupName: pulumi.Output<string>;
  readonly routeTableName: pulumi.Output<string>;
  readonly sreFqdn: pulumi.Output<string>;
  readonly subnetIds: Record<keyof typeof SRE_SUBNET_NAMES, pulumi.Output<string>>;
  readonly virtualNetworkId: pulumi.Output<string>;
  readonly virtualNetworkName: pulumi.Output<string>;

  constructor(
    name: string,
    stackName: string,
    props: SRENetworkingProps,
    tags: Record<string, string>,
    opts?: pulumi.ComponentResourceOptions
  ) {
    super('dsh:sre:NetworkingComponent', name, {}, opts);
    const childOpts = { parent: this };
    const { ranges } = props;

    const resourceGroup = new resources.ResourceGroup(
      `${name}_resource_group`,
      {
        location: props.location,
        resourceGroupName: `${stackName}-rg-networking`,
        tags,
      },
      childOpts
    );

    const securityGroup = (suffix: string, securityRules: SecurityRuleSpec[]) =>
      new network.NetworkSecurityGroup(
        `${name}_nsg_${suffix.replace(/-/g, '_')}`,
        {
          location: props.location,
          networkSecurityGroupName: `${stackName}-nsg-${suffix}`,
          resourceGroupName: resourceGroup.name,
          securityRules,
          tags,
        },
        childOpts
      );

    const nsgApplicationGateway = securityGroup(
      'application-gateway',
      sreApplicationGatewayRules({ ranges, researchUserIps: props.researchUserIps })
    );
    const nsgDataPrivate = securityGroup('data-private', sreDataPrivateRules(ranges));
    const nsgUserServicesDatabases = securityGroup(
      'user-services-databases',
      sreUserServicesDatabasesRules(ranges)
    );
    const nsgWorkspaces = securityGroup('workspaces', sreWorkspacesRules(ranges));

    // Routes are added by the components that own the next hop
    const routeTable = new network.RouteTable(
      `${name}_route_table`,
      {
        location: props.location,
        resourceGroupName: resourceGroup.name,
        routeTableName: `${stackName}-route`,
        tags,
      },
      { ...childOpts, ignoreChanges: ['routes'] }
    );

    const vnet = new network.VirtualNetwork(
      `${name}_vnet`,
      {
        addressSpace: { addressPrefixes: [ranges.vnet.cidr] },
        location: props.location,
        resourceGroupName: resourceGroup.name,
        subnets: [
          {
            name: SRE_SUBNET_NAMES.applicationGateway,
            addressPrefix: ranges.applicationGateway.cidr,
            networkSecurityGroup: { id: nsgApplicationGateway.id },
          },
          {
            name: SRE_SUBNET_NAMES.dataPrivate,
            addressPrefix: ranges.dataPrivate.cidr,
            networkSecurityGroup: { id: nsgDataPrivate.id },
            privateEndpointNetworkPolicies: 'Disabled',
          },
          {
            name: SRE_SUBNET_NAMES.trafficFilter,
            addressPrefix: ranges.firewall.cidr,
            delegations: [CONTAINER_GROUP_DELEGATION],
          },
          {
            name: SRE_SUBNET_NAMES.userServicesContainers,
            addressPrefix: ranges.userServicesContainers.cidr,
            delegations: [CONTAINER_GROUP_DELEGATION],
            routeTable: { id: routeTable.id },
          },
          {
            name: SRE_SUBNET_NAMES.userServicesDatabases,
            addressPrefix: ranges.userServicesDatabases.cidr,
            networkSecurityGroup: { id: nsgUserServicesDatabases.id },
            routeTable: { id: routeTable.id },
          },
          {
            name: SRE_SUBNET_NAMES.workspaces,
            addressPrefix: ranges.workspaces.cidr,
            networkSecurityGroup: { id: nsgWorkspaces.id },
            routeTable: { id: routeTable.id },
          },
        ],
        virtualNetworkName: `${stackName}-vnet`,
        tags,
      },
      childOpts
    );

    const sreFqdn = `${props.sreSubdomain}.${props.shmFqdn}`;
    const dnsZone = new network.Zone(
      `${name}_dns_zone`,
      {
        location: 'Global',
        resourceGroupName: resourceGroup.name,
        zoneName: sreFqdn,
        zoneType: 'Public',
        tags,
      },
      childOpts
    );

    new network.RecordSet(
      `${name}_ns_record`,
      {
        nsRecords: dnsZone.nameServers.apply((servers) => servers.map((nsdname) => ({ nsdname }))),
        recordType: 'NS',
        relativeRecordSetName: props.sreSubdomain,
        resourceGroupName: shmNetworkingResourceGroupName(props.shmStackName),
        ttl: 3600,
        zoneName: props.shmFqdn,
      },
      childOpts
    );

    this.resourceGroupName = resourceGroup.name;
    this.routeTableName = routeTable.name;
    this.sreFqdn = dnsZone.name;
    this.subnetIds = {
      applicationGateway: subnetId(vnet, SRE_SUBNET_NAMES.applicationGateway),
      dataPrivate: subnetId(vnet, SRE_SUBNET_NAMES.dataPrivate),
      trafficFilter: subnetId(vnet, SRE_SUBNET_NAMES.trafficFilter),
      userServicesContainers: subnetId(vnet, SRE_SUBNET_NAMES.userServicesContainers),
      userServicesDatabases: subnetId(vnet, SRE_SUBNET_NAMES.userServicesDatabases),
      workspaces: subnetId(vnet, SRE_SUBNET_NAMES.workspaces),
    };
    this.virtualNetworkId = vnet.id;
    this.virtualNetworkName = vnet.name;
    this.registerOutputs({
      sreFqdn: this.sreFqdn,
      virtualNetworkName: this.virtualNetworkName,
    });
  }
}
