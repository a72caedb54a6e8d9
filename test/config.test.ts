/**
 * Tests for SHM, SRE and Pulumi configuration
 */
import { DSHPulumiConfig } from '../src/config/pulumi-config';
import { updateRemoteDesktopSection, updateShmSection, updateSreSection } from '../src/config/sections';
import { SHMConfig } from '../src/config/shm-config';
import { SREConfig } from '../src/config/sre-config';
import { Context } from '../src/context/context';
import { MemoryBlobStore, quietConsole } from './helpers';

const SUBSCRIPTION_ID = '00000000-1111-2222-3333-444444444444';
const TENANT_ID = 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd';

const SHM_YAML = `
azure:
  subscription_id: ${SUBSCRIPTION_ID}
  tenant_id: ${TENANT_ID}
shm:
  entra_tenant_id: ${TENANT_ID}
  fqdn: acme.example.com
`;

const SRE_YAML = `
azure:
  subscription_id: ${SUBSCRIPTION_ID}
  tenant_id: ${TENANT_ID}
name: Sandbox One
sre:
  admin_email_address: admin@acme.example.com
`;

const context = new Context({
  admin_group_id: TENANT_ID,
  location: 'uksouth',
  name: 'Acme',
  subscription_name: 'Acme Subscription',
});

quietConsole();

describe('SHMConfig', () => {
  test('loads valid YAML', () => {
    const config = SHMConfig.fromYaml(SHM_YAML);
    expect(config.shm.fqdn).toBe('acme.example.com');
    expect(config.azure.subscription_id).toBe(SUBSCRIPTION_ID);
  });

  test('refuses to load without every section', () => {
    const withoutShm = SHM_YAML.slice(0, SHM_YAML.indexOf('shm:'));
    expect(() => SHMConfig.fromYaml(withoutShm)).toThrow(
      'Could not load SHMConfig configuration.\nshm: Required'
    );
  });

  test('reports every invalid field', () => {
    const text = SHM_YAML.replace('acme.example.com', 'not a domain').replace(
      `entra_tenant_id: ${TENANT_ID}`,
      'entra_tenant_id: nope'
    );
    expect(() => SHMConfig.fromYaml(text)).toThrow(
      'Could not load SHMConfig configuration.\n' +
        "shm.entra_tenant_id: Expected GUID, for example 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd'.\n" +
        "shm.fqdn: Expected valid fully qualified domain name, for example 'example.com'."
    );
  });

  test('round-trips through remote storage', async () => {
    const store = new MemoryBlobStore();
    await SHMConfig.fromYaml(SHM_YAML).upload(context, store);
    expect([...store.blobs.keys()]).toEqual(['shmacmecontext/config/shm.yaml']);
    expect(await SHMConfig.remoteExists(context, store)).toBe(true);

    const loaded = await SHMConfig.fromRemote(context, store);
    expect(loaded.settings).toEqual(SHMConfig.fromYaml(SHM_YAML).settings);
  });

  test('provides a template with every field', () => {
    const template = SHMConfig.template();
    expect(template).toContain('entra_tenant_id: Tenant ID for the Entra ID used to manage TRE users');
    expect(template).toContain('subscription_id: ID of the Azure subscription that the TRE will be deployed to');
  });
});

describe('SREConfig', () => {
  test('fills in defaults', () => {
    const config = SREConfig.fromYaml(SRE_YAML);
    expect(config.description).toBe('');
    expect(config.sre).toEqual({
      admin_email_address: 'admin@acme.example.com',
      admin_ip_addresses: [],
      databases: [],
      data_provider_ip_addresses: [],
      remote_desktop: { allow_copy: false, allow_paste: false },
      research_user_ip_addresses: [],
      software_packages: 'none',
      timezone: 'Etc/UTC',
      workspace_skus: [],
    });
  });

  test('is stored under its sanitised name', () => {
    expect(SREConfig.fromYaml(SRE_YAML).filename).toBe('sre-sandbox-one.yaml');
    expect(SREConfig.filenameFromName('Sandbox One')).toBe('sre-sandbox-one.yaml');
  });

  test('needs administrator addresses before it is complete', () => {
    const config = SREConfig.fromYaml(SRE_YAML);
    expect(config.isComplete()).toBe(false);
    const withAdmins = SREConfig.fromYaml(`${SRE_YAML}  admin_ip_addresses:\n    - 1.2.3.4\n`);
    expect(withAdmins.sre.admin_ip_addresses).toEqual(['1.2.3.4/32']);
    expect(withAdmins.isComplete()).toBe(true);
  });

  test('rejects duplicate databases', () => {
    const text = `${SRE_YAML}  databases:\n    - postgresql\n    - postgresql\n`;
    expect(() => SREConfig.fromYaml(text)).toThrow(
      'Could not load SREConfig configuration.\nsre.databases: All items must be unique.'
    );
  });

  test('loads from remote storage by name', async () => {
    const store = new MemoryBlobStore();
    await SREConfig.fromYaml(SRE_YAML).upload(context, store);
    expect(await SREConfig.remoteExists(context, store, 'Sandbox One')).toBe(true);
    expect(await SREConfig.remoteExists(context, store, 'Sandbox Two')).toBe(false);
    expect((await SREConfig.fromRemote(context, store, 'sandbox one')).name).toBe('Sandbox One');
  });

  test('can be removed from remote storage', async () => {
    const store = new MemoryBlobStore();
    const config = SREConfig.fromYaml(SRE_YAML);
    await config.upload(context, store);
    await config.removeRemote(context, store);
    expect(await SREConfig.remoteExists(context, store, 'Sandbox One')).toBe(false);
  });
});

describe('section updates', () => {
  test('updates only the SHM fields that were supplied', () => {
    const section = SHMConfig.fromYaml(SHM_YAML).shm;
    expect(updateShmSection(section, { fqdn: 'example.org' })).toEqual({
      entra_tenant_id: TENANT_ID,
      fqdn: 'example.org',
    });
  });

  test('rejects invalid SHM values', () => {
    const section = SHMConfig.fromYaml(SHM_YAML).shm;
    expect(() => updateShmSection(section, { entraTenantId: 'nope' })).toThrow(
      "Invalid SHM settings.\nentra_tenant_id: Expected GUID, for example 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd'."
    );
  });

  test('normalises SRE values', () => {
    const section = SREConfig.fromYaml(SRE_YAML).sre;
    const updated = updateSreSection(section, {
      adminIpAddresses: ['1.2.3.4', '10.0.0.0/24'],
      databases: ['postgresql', 'microsoftsqlserver', 'postgresql'],
      softwarePackages: 'pre-approved',
      userIpAddresses: [],
    });
    expect(updated.admin_ip_addresses).toEqual(['1.2.3.4/32', '10.0.0.0/24']);
    expect(updated.databases).toEqual(['microsoftsqlserver', 'postgresql']);
    expect(updated.software_packages).toBe('pre-approved');
    expect(updated.research_user_ip_addresses).toEqual([]);
    expect(updated.timezone).toBe('Etc/UTC');
  });

  test('rejects an unknown timezone', () => {
    const section = SREConfig.fromYaml(SRE_YAML).sre;
    expect(() => updateSreSection(section, { timezone: 'Mars/Olympus' })).toThrow(
      "Invalid SRE settings.\ntimezone: Expected valid timezone, for example 'Europe/London'."
    );
  });

  test('toggles remote desktop permissions', () => {
    expect(updateRemoteDesktopSection({ allow_copy: false, allow_paste: true }, { allowCopy: true })).toEqual({
      allow_copy: true,
      allow_paste: true,
    });
  });
});

describe('DSHPulumiConfig', () => {
  test('starts empty', () => {
    expect(new DSHPulumiConfig().toYaml()).toBe('encrypted_key: null\nprojects: {}\n');
  });

  test('creates, selects and removes projects', () => {
    const config = new DSHPulumiConfig();
    const project = config.createOrSelectProject('shm');
    project.stack_config['shm:location'] = 'uksouth';
    expect(config.createOrSelectProject('shm').stack_config).toEqual({ 'shm:location': 'uksouth' });
    expect(config.projectNames).toEqual(['shm']);
    config.removeProject('shm');
    expect(config.project('shm')).toBeUndefined();
  });

  test('loads stack settings from YAML', () => {
    const config = DSHPulumiConfig.fromYaml(
      'encrypted_key: placeholder-key\nprojects:\n  sre-sandbox:\n    stack_config:\n      sre-sandbox:sre-index: "2"\n'
    );
    expect(config.encryptedKey).toBe('placeholder-key');
    expect(config.project('sre-sandbox')?.stack_config).toEqual({ 'sre-sandbox:sre-index': '2' });
  });

  test('falls back to empty settings when nothing was uploaded', async () => {
    const store = new MemoryBlobStore();
    const config = await DSHPulumiConfig.fromRemoteOrCreate(context, store);
    expect(config.projectNames).toEqual([]);

    config.createOrSelectProject('shm');
    await config.upload(context, store);
    expect((await DSHPulumiConfig.fromRemoteOrCreate(context, store)).projectNames).toEqual(['shm']);
  });
});
