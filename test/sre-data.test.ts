import * as pulumi from '@pulumi/pulumi';

import { SREDataComponent, storagePrivateDnsZone } from '../src/infrastructure/programs/sre/data';

const STACK_NAME = 'shm-acmedeployment-sre-sandbox';

const registered: pulumi.runtime.MockResourceArgs[] = [];
let onRegistered: (args: pulumi.runtime.MockResourceArgs) => void = () => undefined;

function ofType(type: string): pulumi.runtime.MockResourceArgs[] {
  return registered
    .filter((args) => args.type === type)
    .sort((left, right) => left.name.localeCompare(right.name));
}

beforeAll(async () => {
  await pulumi.runtime.setMocks(
    {
      newResource: (args) => {
        registered.push(args);
        onRegistered(args);
        return { id: `${args.name}_id`, state: { ...args.inputs, name: args.name } };
      },
      call: (args) => args.inputs,
    },
    'sre-sandbox',
    STACK_NAME,
    false
  );
});

describe('storagePrivateDnsZone', () => {
  test('names the private link zone of a storage service', () => {
    expect(storagePrivateDnsZone('blob')).toBe('privatelink.blob.core.windows.net');
    expect(storagePrivateDnsZone('file')).toBe('privatelink.file.core.windows.net');
  });

  test('rejects services without a zone', () => {
    expect(() => storagePrivateDnsZone('table')).toThrow("No private DNS zone for storage service 'table'.");
  });
});

describe('SREDataComponent', () => {
  beforeAll(async () => {
    const zoneGroups = new Promise<void>((resolve) => {
      let remaining = 2;
      onRegistered = (args) => {
        if (args.type === 'azure-native:network:PrivateDnsZoneGroup') {
          remaining -= 1;
          if (remaining === 0) {
            resolve();
          }
        }
      };
    });
    new SREDataComponent(
      'sre_data',
      STACK_NAME,
      {
        adminGroupId: 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd',
        dataProviderIps: ['1.2.3.4/31', '10.0.0.0/24'],
        location: 'uksouth',
        secrets: {},
        shmName: 'acmedeployment',
        sreName: 'sandbox',
        subnetDataPrivateId: 'subnet-data-private-id',
        tenantId: '2a1c9a7e-7b7b-4a4e-9b36-5a3c2a1b0c0d',
        virtualNetworkId: 'sre-vnet-id',
      },
      {}
    );
    await zoneGroups;
  });

  test('allows each data provider address through the storage firewall', () => {
    const [account] = ofType('azure-native:storage:StorageAccount');
    expect(account?.inputs.networkRuleSet.ipRules).toEqual([
      { action: 'Allow', iPAddressOrRange: '1.2.3.4' },
      { action: 'Allow', iPAddressOrRange: '1.2.3.5' },
      { action: 'Allow', iPAddressOrRange: '10.0.0.0/24' },
    ]);
  });

  test('places a blob and a file private endpoint in the data subnet', () => {
    const endpoints = ofType('azure-native:network:PrivateEndpoint');
    expect(endpoints.map((endpoint) => endpoint.inputs.subnet)).toEqual([
      { id: 'subnet-data-private-id' },
      { id: 'subnet-data-private-id' },
    ]);
    expect(endpoints.map((endpoint) => endpoint.inputs.privateLinkServiceConnections)).toEqual([
      [
        {
          groupIds: ['blob'],
          name: `${STACK_NAME}-cnxn-pep-storage-blob`,
          privateLinkServiceId: 'sre_data_storage_account_data_id',
        },
      ],
      [
        {
          groupIds: ['file'],
          name: `${STACK_NAME}-cnxn-pep-storage-file`,
          privateLinkServiceId: 'sre_data_storage_account_data_id',
        },
      ],
    ]);
  });

  test('creates the private link zones and links them to the SRE network', () => {
    expect(ofType('azure-native:network:PrivateZone').map((zone) => zone.inputs.privateZoneName)).toEqual([
      'privatelink.blob.core.windows.net',
      'privatelink.file.core.windows.net',
    ]);
    expect(
      ofType('azure-native:network:VirtualNetworkLink').map((link) => link.inputs.virtualNetwork)
    ).toEqual([{ id: 'sre-vnet-id' }, { id: 'sre-vnet-id' }]);
  });

  test('registers each endpoint in its private link zone', () => {
    expect(
      ofType('azure-native:network:PrivateDnsZoneGroup').map((group) => group.inputs.privateDnsZoneConfigs)
    ).toEqual([
      [{ name: 'privatelink-blob-core-windows-net', privateDnsZoneId: 'sre_data_private_zone_blob_id' }],
      [{ name: 'privatelink-file-core-windows-net', privateDnsZoneId: 'sre_data_private_zone_file_id' }],
    ]);
  });
});
