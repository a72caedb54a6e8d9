/**
 * Network Security Rules
 *
 * Pure builders for the NSG rule sets attached to SHM and SRE subnets.
 * Field names match the azure-native SecurityRule arguments so the
 * programs can pass them straight through.
 */

import type { SHMIpRanges, SREIpRanges } from './ip-ranges.js';
import { AZURE_PLATFORM_IP, NetworkingPriorities, Ports } from './enums.js';

export type RuleDirection = 'Inbound' | 'Outbound';

export interface SecurityRuleSpec {
  name: string;
  description: string;
  access: 'Allow' | 'Deny';
  direction: RuleDirection;
  priority: number;
  protocol: '*' | 'Tcp' | 'Udp';
  sourceAddressPrefix?: string;
  sourceAddressPrefixes?: string[];
  sourcePortRange: string;
  destinationAddressPrefix?: string;
  destinationAddressPrefixes?: string[];
  destinationPortRange?: string;
  destinationPortRanges?: string[];
}

type RuleFields = Omit<SecurityRuleSpec, 'sourcePortRange' | 'access' | 'direction'>;

function allow(direction: RuleDirection, rule: RuleFields): SecurityRuleSpec {
  return { ...rule, access: 'Allow', direction, sourcePortRange: '*' };
}

function denyAll(direction: RuleDirection): SecurityRuleSpec {
  return {
    name: `DenyAllOther${direction}`,
    description: `Deny all other ${direction.toLowerCase()} traffic.`,
    access: 'Deny',
    direction,
    priority: NetworkingPriorities.ALL_OTHER,
    protocol: '*',
    sourceAddressPrefix: '*',
    sourcePortRange: '*',
    destinationAddressPrefix: '*',
    destinationPortRange: '*',
  };
}

/**
 * Single prefixes and lists use different fields in Azure
 */
function sources(prefixes: string[]): Pick<SecurityRuleSpec, 'sourceAddressPrefix' | 'sourceAddressPrefixes'> {
  const [only] = prefixes;
  return prefixes.length === 1 && only ? { sourceAddressPrefix: only } : { sourceAddressPrefixes: prefixes };
}

export interface ApplicationGatewayRuleProps {
  ranges: SREIpRanges;
  researchUserIps: string[];
}

export function sreApplicationGatewayRules(props: ApplicationGatewayRuleProps): SecurityRuleSpec[] {
  const { ranges } = props;
  const rules: SecurityRuleSpec[] = [
    allow('Inbound', {
      name: 'AllowGatewayManagerServiceInbound',
      description: 'Allow inbound gateway management service traffic.',
      priority: NetworkingPriorities.AZURE_GATEWAY_MANAGER,
      protocol: '*',
      sourceAddressPrefix: 'GatewayManager',
      destinationAddressPrefix: '*',
      destinationPortRange: '65200-65535',
    }),
    allow('Inbound', {
      name: 'AllowAzureLoadBalancerServiceInbound',
      description: 'Allow inbound load balancer service traffic.',
      priority: NetworkingPriorities.AZURE_LOAD_BALANCER,
      protocol: '*',
      sourceAddressPrefix: 'AzureLoadBalancer',
      destinationAddressPrefix: '*',
      destinationPortRange: '*',
    }),
  ];
  if (props.researchUserIps.length > 0) {
    rules.push(
      allow('Inbound', {
        name: 'AllowUsersInternetInbound',
        description: 'Allow inbound connections from users over the internet.',
        priority: NetworkingPriorities.AUTHORISED_EXTERNAL_USER_IPS,
        protocol: 'Tcp',
        ...sources(props.researchUserIps),
        destinationAddressPrefix: ranges.applicationGateway.cidr,
        destinationPortRanges: [Ports.HTTP, Ports.HTTPS],
      })
    );
  }
  rules.push(
    denyAll('Inbound'),
    allow('Outbound', {
      name: 'AllowGuacamoleContainersOutbound',
      description: 'Allow outbound connections to the Guacamole remote desktop gateway.',
      priority: NetworkingPriorities.INTERNAL_SRE_GUACAMOLE_CONTAINERS,
      protocol: 'Tcp',
      sourceAddressPrefix: ranges.applicationGateway.cidr,
      destinationAddressPrefix: ranges.guacamoleContainers.cidr,
      destinationPortRange: Ports.HTTP,
    }),
    allow('Outbound', {
      name: 'AllowInternetOutbound',
      description: 'Allow outbound connections to the internet for gateway management.',
      priority: NetworkingPriorities.EXTERNAL_INTERNET,
      protocol: '*',
      sourceAddressPrefix: '*',
      destinationAddressPrefix: 'Internet',
      destinationPortRange: '*',
    }),
    denyAll('Outbound')
  );
  return rules;
}

export function sreWorkspacesRules(ranges: SREIpRanges): SecurityRuleSpec[] {
  const workspaces = ranges.workspaces.cidr;
  return [
    allow('Inbound', {
      name: 'AllowGuacamoleContainersInbound',
      description: 'Allow inbound remote desktop connections from the Guacamole gateway.',
      priority: NetworkingPriorities.INTERNAL_SRE_GUACAMOLE_CONTAINERS,
      protocol: 'Tcp',
      sourceAddressPrefix: ranges.guacamoleContainers.cidr,
      destinationAddressPrefix: workspaces,
      destinationPortRanges: [Ports.SSH, Ports.RDP],
    }),
    denyAll('Inbound'),
    allow('Outbound', {
      name: 'AllowAzurePlatformDnsOutbound',
      description: 'Allow outbound DNS requests to the Azure platform resolver.',
      priority: NetworkingPriorities.AZURE_PLATFORM_DNS,
      protocol: '*',
      sourceAddressPrefix: workspaces,
      destinationAddressPrefix: AZURE_PLATFORM_IP,
      destinationPortRange: Ports.DNS,
    }),
    allow('Outbound', {
      name: 'AllowDataPrivateEndpointsOutbound',
      description: 'Allow outbound connections to the private data endpoints.',
      priority: NetworkingPriorities.INTERNAL_SRE_DATA_PRIVATE,
      protocol: '*',
      sourceAddressPrefix: workspaces,
      destinationAddressPrefix: ranges.dataPrivate.cidr,
      destinationPortRange: '*',
    }),
    allow('Outbound', {
      name: 'AllowIdentityServersOutbound',
      description: 'Allow outbound LDAP connections to the identity containers.',
      priority: NetworkingPriorities.INTERNAL_SRE_IDENTITY_CONTAINERS,
      protocol: 'Tcp',
      sourceAddressPrefix: workspaces,
      destinationAddressPrefix: ranges.identityContainers.cidr,
      destinationPortRanges: [Ports.LDAP, Ports.LDAPS],
    }),
    allow('Outbound', {
      name: 'AllowTrafficFilterOutbound',
      description: 'Allow outbound web proxy connections to the traffic filter.',
      priority: NetworkingPriorities.INTERNAL_SRE_TRAFFIC_FILTER,
      protocol: 'Tcp',
      sourceAddressPrefix: workspaces,
      destinationAddressPrefix: ranges.firewall.cidr,
      destinationPortRange: Ports.SQUID,
    }),
    allow('Outbound', {
      name: 'AllowUserServicesDatabasesOutbound',
      description: 'Allow outbound connections to the user services databases.',
      priority: NetworkingPriorities.INTERNAL_SRE_USER_SERVICES_DATABASES,
      protocol: 'Tcp',
      sourceAddressPrefix: workspaces,
      destinationAddressPrefix: ranges.userServicesDatabases.cidr,
      destinationPortRanges: [Ports.MSSQL, Ports.POSTGRESQL],
    }),
    allow('Outbound', {
      name: 'AllowUserServicesSoftwareRepositoriesOutbound',
      description: 'Allow outbound connections to the software repository mirrors.',
      priority: NetworkingPriorities.INTERNAL_SRE_USER_SERVICES_SOFTWARE_REPOSITORIES,
      protocol: 'Tcp',
      sourceAddressPrefix: workspaces,
      destinationAddressPrefix: ranges.userServicesSoftwareRepositories.cidr,
      destinationPortRanges: [Ports.HTTP, Ports.HTTPS, Ports.SQUID],
    }),
    denyAll('Outbound'),
  ];
}

export function sreUserServicesDatabasesRules(ranges: SREIpRanges): SecurityRuleSpec[] {
  return [
    allow('Inbound', {
      name: 'AllowWorkspacesInbound',
      description: 'Allow inbound database connections from workspaces.',
      priority: NetworkingPriorities.INTERNAL_SRE_WORKSPACES,
      protocol: 'Tcp',
      sourceAddressPrefix: ranges.workspaces.cidr,
      destinationAddressPrefix: ranges.userServicesDatabases.cidr,
      destinationPortRanges: [Ports.MSSQL, Ports.POSTGRESQL],
    }),
    denyAll('Inbound'),
    denyAll('Outbound'),
  ];
}

export function sreDataPrivateRules(ranges: SREIpRanges): SecurityRuleSpec[] {
  return [
    allow('Inbound', {
      name: 'AllowWorkspacesInbound',
      description: 'Allow inbound connections from workspaces to the private data endpoints.',
      priority: NetworkingPriorities.INTERNAL_SRE_WORKSPACES,
      protocol: '*',
      sourceAddressPrefix: ranges.workspaces.cidr,
      destinationAddressPrefix: ranges.dataPrivate.cidr,
      destinationPortRange: '*',
    }),
    denyAll('Inbound'),
    denyAll('Outbound'),
  ];
}

export interface BastionRuleProps {
  ranges: SHMIpRanges;
  /** Where admins connect from; anywhere on the internet when empty */
  adminIps?: string[];
}

export function shmBastionRules(props: BastionRuleProps): SecurityRuleSpec[] {
  const bastion = props.ranges.bastion.cidr;
  const adminIps = props.adminIps?.length ? props.adminIps : ['Internet'];
  const bastionPorts = [Ports.AZURE_BASTION_DATA_PLANE, Ports.AZURE_BASTION_HOST_COMMUNICATION];
  return [
    allow('Inbound', {
      name: 'AllowGatewayManagerServiceInbound',
      description: 'Allow inbound gateway management service traffic.',
      priority: NetworkingPriorities.AZURE_GATEWAY_MANAGER,
      protocol: 'Tcp',
      sourceAddressPrefix: 'GatewayManager',
      destinationAddressPrefix: '*',
      destinationPortRange: Ports.HTTPS,
    }),
    allow('Inbound', {
      name: 'AllowLoadBalancerServiceInbound',
      description: 'Allow inbound load balancer service traffic.',
      priority: NetworkingPriorities.AZURE_LOAD_BALANCER,
      protocol: 'Tcp',
      sourceAddressPrefix: 'AzureLoadBalancer',
      destinationAddressPrefix: '*',
      destinationPortRange: Ports.HTTPS,
    }),
    allow('Inbound', {
      name: 'AllowBastionHostInbound',
      description: 'Allow inbound internal bastion host communication.',
      priority: NetworkingPriorities.INTERNAL_SELF,
      protocol: '*',
      sourceAddressPrefix: 'VirtualNetwork',
      destinationAddressPrefix: 'VirtualNetwork',
      destinationPortRanges: bastionPorts,
    }),
    allow('Inbound', {
      name: 'AllowAdminHttpsInbound',
      description: 'Allow inbound https connections from admins connecting from approved IP addresses.',
      priority: NetworkingPriorities.AUTHORISED_EXTERNAL_ADMIN_IPS,
      protocol: 'Tcp',
      ...sources(adminIps),
      destinationAddressPrefix: bastion,
      destinationPortRange: Ports.HTTPS,
    }),
    denyAll('Inbound'),
    allow('Outbound', {
      name: 'AllowAzureCloudOutbound',
      description: 'Allow outbound connections to the Azure cloud.',
      priority: NetworkingPriorities.AZURE_CLOUD,
      protocol: 'Tcp',
      sourceAddressPrefix: '*',
      destinationAddressPrefix: 'AzureCloud',
      destinationPortRange: Ports.HTTPS,
    }),
    allow('Outbound', {
      name: 'AllowBastionHostOutbound',
      description: 'Allow outbound internal bastion host communication.',
      priority: NetworkingPriorities.INTERNAL_SELF,
      protocol: '*',
      sourceAddressPrefix: 'VirtualNetwork',
      destinationAddressPrefix: 'VirtualNetwork',
      destinationPortRanges: bastionPorts,
    }),
    allow('Outbound', {
      name: 'AllowRdpSshOutbound',
      description: 'Allow outbound RDP and SSH connections to virtual machines.',
      priority: NetworkingPriorities.INTERNAL_VIRTUAL_NETWORK,
      protocol: 'Tcp',
      sourceAddressPrefix: '*',
      destinationAddressPrefix: 'VirtualNetwork',
      destinationPortRanges: [Ports.SSH, Ports.RDP],
    }),
    allow('Outbound', {
      name: 'AllowGetSessionInformationOutbound',
      description: 'Allow outbound session and certificate validation requests.',
      priority: NetworkingPriorities.EXTERNAL_INTERNET,
      protocol: '*',
      sourceAddressPrefix: '*',
      destinationAddressPrefix: 'Internet',
      destinationPortRange: Ports.HTTP,
    }),
    denyAll('Outbound'),
  ];
}
