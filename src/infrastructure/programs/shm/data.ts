/**
 * SHM data: a key vault that SHM administrators manage
 */

import * as pulumi from '@pulumi/pulumi';
import * as keyvault from '@pulumi/azure-native/keyvault';
import * as resources from '@pulumi/azure-native/resources';

export interface SHMDataProps {
  adminGroupId: string;
  location: string;
  tenantId: string;
  keyVaultName: string;
}

export class SHMDataComponent extends pulumi.ComponentResource {
  readonly keyVaultName: pulumi.Output<string>;
  readonly resourceGroupName: pulumi.Output<string>;

  constructor(
    name: string,
    stackName: string,
    props: SHMDataProps,
    tags: Record<string, string>,
    opts?: pulumi.ComponentResourceOptions
  ) {
    super('dsh:shm:DataComponent', name, {}, opts);
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
        vaultName: props.keyVaultName,
        tags,
      },
      childOpts
    );

    this.keyVaultName = vault.name;
    this.resourceGroupName = resourceGroup.name;
    this.registerOutputs({ keyVaultName: this.keyVaultName });
  }
}
