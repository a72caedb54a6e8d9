/**
 * SRE data: secrets key vault and the storage account that data providers
 * upload to and egress is collected from. Workspaces reach the account
 * through private endpoints in the data subnet.
 */

import * as pulumi from '@pulumi/pulumi';
import * as keyvault from '@pulumi/azure-native/keyvault';
import * as network from '@pulumi/azure-native/network';
import * as resources from '@pulumi/azure-native/resources';
import * as storage from '@pulumi/azure-native/storage';

import { orderedPrivateDnsZones } from '../../../utils/dns.js';
import { storageIpRules, sreUniqueName } from '../../common/names.js';

export const SRE_DATA_CONTAINERS = ['egress', 'ingress'] as const;

// Storage services exposed inside the SRE, one private endpoint each
export const SRE_DATA_PRIVATE_SERVICES = ['blob', 'file'] as const;

export function storagePrivateDnsZone(service: string): string {
  const zoneName = orderedPrivateDnsZones('Storage account').find((zone) =>
    zone.startsWith(`privatelink.${service}.`)
  );
  if (!zoneName) {
    throw new Error(`No private DNS zone for storage service '${service}'.`);
  }
  return zoneName;
}

export interface SREDataProps {
  adminGroupId: string;
  dataProviderIps: string[];
  location: string;
  secrets: Record<string, pulumi.Input<string>>;
  shmName: string;
  sreName: string;
  subnetDataPrivateId: pulumi.Input<string>;
  tenantId: string;
  virtualNetworkId: pulumi.Input<string>;
}

export class SREDataComponent extends pulumi.ComponentResource {
  readonly keyVaultName: pulumi.Output<string>;
  readonly resourceGroupName: pulumi.Output<string>;
  readonly storageAccountName: pulumi.Output<string>;

  constructor(
    name: string,
    stackName: string,
    props: SREDataProps,
    tags: Record<string, string>,
    opts?: pulumi.ComponentResourceOptions
  ) {
    super('dsh:sre:DataComponent', name, {}, opts);
    const childOpts = { parent: this };

    const resourceGroup = new resources.ResourceGroup(
      `${name}_resource_group`,
      {
        location: props.location,
        resourceGroupName: `${stackName}-rg-data`,
        tags,
      },
      childOpts
    );

    const vault = new keyvault.Vault(
      `${name}_kv_secrets`,
      {
        location: props.location,
        properties: {
          accessPolicies: [
            {
              objectId: props.adminGroupId,
              permissions: {
                certificates: ['get', 'list', 'delete', 'create', 'import', 'update', 'purge'],
                keys: ['get', 'list', 'delete', 'create', 'import', 'update', 'purge'],
                secrets: ['get', 'list', 'delete', 'set', 'purge'],
              },
              tenantId: props.tenantId,
            },
          ],
          enableSoftDelete: true,
          sku: { family: 'A', name: 'standard' },
          softDeleteRetentionInDays: 7,
          tenantId: props.tenantId,
        },
        resourceGroupName: resourceGroup.name,
        vaultName: sreUniqueName(props.shmName, props.sreName, 'kv'),
        tags,
      },
      childOpts
    );

    for (const [secretName, value] of Object.entries(props.secrets)) {
      new keyvault.Secret(
        `${name}_kvs_${secretName.replace(/-/g, '_')}`,
        {
          properties: { value },
          resourceGroupName: resourceGroup.name,
          secretName,
          vaultName: vault.name,
        },
        { parent: vault }
      );
    }

    // Only data providers may reach the account from outside the SRE
    const account = new storage.StorageAccount(
      `${name}_storage_account_data`,
      {
        accountName: sreUniqueName(props.shmName, props.sreName, 'data'),
        allowBlobPublicAccess: false,
        enableHttpsTrafficOnly: true,
        kind: 'StorageV2',
        location: props.location,
        minimumTlsVersion: 'TLS1_2',
        networkRuleSet: {
          bypass: 'AzureServices',
          defaultAction: 'Deny',
          ipRules: props.dataProviderIps.flatMap(storageIpRules).map((address) => ({
            action: 'Allow',
            iPAddressOrRange: address,
          })),
        },
        resourceGroupName: resourceGroup.name,
        sku: { name: 'Standard_LRS' },
        tags,
      },
      childOpts
    );

    for (const containerName of SRE_DATA_CONTAINERS) {
      new storage.BlobContainer(
        `${name}_blob_${containerName}`,
        {
          accountName: account.name,
          containerName,
          publicAccess: 'None',
          resourceGroupName: resourceGroup.name,
        },
        { parent: account }
      );
    }

    for (const service of SRE_DATA_PRIVATE_SERVICES) {
      const endpoint = new network.PrivateEndpoint(
        `${name}_pep_storage_${service}`,
        {
          customNetworkInterfaceName: `${stackName}-pep-storage-${service}-nic`,
          location: props.location,
          privateEndpointName: `${stackName}-pep-storage-${service}`,
          privateLinkServiceConnections: [
            {
              groupIds: [service],
              name: `${stackName}-cnxn-pep-storage-${service}`,
              privateLinkServiceId: account.id,
            },
          ],
          resourceGroupName: resourceGroup.name,
          subnet: { id: props.subnetDataPrivateId },
          tags,
        },
        { parent: account }
      );

      const zoneName = storagePrivateDnsZone(service);
      const zone = new network.PrivateZone(
        `${name}_private_zone_${service}`,
        {
          location: 'Global',
          privateZoneName: zoneName,
          resourceGroupName: resourceGroup.name,
          tags,
        },
        childOpts
      );
      new network.VirtualNetworkLink(
        `${name}_private_zone_${service}_vnet_link`,
        {
          location: 'Global',
          privateZoneName: zone.name,
          registrationEnabled: false,
          resourceGroupName: resourceGroup.name,
          virtualNetwork: { id: props.virtualNetworkId },
          virtualNetworkLinkName: `link-to-${stackName}-vnet`,
          tags,
        },
        { parent: zone }
      );
      new network.PrivateDnsZoneGroup(
        `${name}_pep_storage_${service}_dns_zone_group`,
        {
          privateDnsZoneConfigs: [
            {
              name: zoneName.replace(/\./g, '-'),
              privateDnsZoneId: zone.id,
            },
          ],
          privateDnsZoneGroupName: `${stackName}-dzg-storage-${service}`,
          privateEndpointName: endpoint.name,
          resourceGroupName: resourceGroup.name,
        },
        { parent: endpoint }
      );
    }

    this.keyVaultName = vault.name;
    this.resourceGroupName = resourceGroup.name;
    this.storageAccountName = account.name;
    this.registerOutputs({
      keyVaultName: this.keyVaultName,
      storageAccountName: this.storageAccountName,
    });
  }
}
