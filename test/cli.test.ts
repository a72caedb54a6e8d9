/**
 * Tests for running commands end to end with in-memory Azure storage
 */
import { Command } from 'commander';

import { createProgram, runProgram } from '../src/cli/program';
import { DSHPulumiConfig } from '../src/config/pulumi-config';
import { SREConfig } from '../src/config/sre-config';
import { ContextManager } from '../src/context/context-manager';
import { AzureApi } from '../src/external/azure-api';
import type { TextFetcher } from '../src/utils/network';
import { MemoryBlobStore } from './helpers';

const TENANT_ID = 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd';
const ADMIN_IP = '198.51.100.1';

const SRE_YAML = `
azure:
  subscription_id: 00000000-1111-2222-3333-444444444444
  tenant_id: ${TENANT_ID}
name: Sandbox One
sre:
  admin_email_address: admin@acme.example.com
  admin_ip_addresses:
    - ${ADMIN_IP}
`;

function respondWith(address: string): TextFetcher {
  return async () => ({ ok: true, status: 200, text: async () => address });
}

describe('runProgram', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  test('reports unexpected errors on one line and fails', async () => {
    const program = new Command('dsh');
    program.command('explode').action(() => {
      throw new Error('wires crossed');
    });

    await runProgram(['node', 'dsh', 'explode'], program);

    expect(errorSpy.mock.calls).toEqual([['Unexpected error: wires crossed']]);
    expect(process.exitCode).toBe(1);
  });

  test('leaves the exit code alone when the command succeeds', async () => {
    const program = new Command('dsh');
    program.command('noop').action(() => undefined);

    await runProgram(['node', 'dsh', 'noop'], program);

    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  describe('dsh sre deploy', () => {
    let store: MemoryBlobStore;

    function deploy(callerAddress: string): Promise<void> {
      const azureApi = new AzureApi('Acme Subscription');
      jest.spyOn(azureApi, 'blobExists').mockImplementation((name, location) => store.blobExists(name, location));
      jest.spyOn(azureApi, 'downloadBlob').mockImplementation((name, location) => store.downloadBlob(name, location));
      const program = createProgram({ azureApiFor: () => azureApi, fetcher: respondWith(callerAddress) });
      return runProgram(['node', 'dsh', 'sre', 'deploy', 'Sandbox One'], program);
    }

    beforeEach(async () => {
      const manager = new ContextManager(
        {
          acme: {
            admin_group_id: TENANT_ID,
            location: 'uksouth',
            name: 'Acme',
            subscription_name: 'Acme Subscription',
          },
        },
        'acme'
      );
      manager.write();
      store = new MemoryBlobStore();
      await SREConfig.fromYaml(SRE_YAML).upload(manager.assertContext(), store);
    });

    test('refuses callers outside the administrator addresses', async () => {
      await deploy('203.0.113.7');

      expect(errorSpy.mock.calls).toEqual([
        ["Could not deploy Secure Research Environment 'Sandbox One'."],
        ["IP address '203.0.113.7' is not authorised to deploy SRE 'Sandbox One'. Add it to 'admin_ip_addresses'."],
      ]);
      expect(process.exitCode).toBe(1);
    });

    test('refuses to deploy before the SHM exists', async () => {
      await deploy(ADMIN_IP);

      expect(errorSpy.mock.calls).toEqual([
        ["Could not deploy Secure Research Environment 'Sandbox One'."],
        ["No Pulumi project for 'shm'."],
        ['Have you deployed the SHM?'],
      ]);
      expect(process.exitCode).toBe(1);
    });

    test('refuses when the Pulumi settings record no SHM project', async () => {
      const context = ContextManager.fromFile().assertContext();
      const pulumiConfig = new DSHPulumiConfig();
      pulumiConfig.createOrSelectProject('sre-other');
      await pulumiConfig.upload(context, store);

      await deploy(ADMIN_IP);

      expect(errorSpy.mock.calls[1]).toEqual(["No Pulumi project for 'shm'."]);
      expect(process.exitCode).toBe(1);
    });
  });
});
