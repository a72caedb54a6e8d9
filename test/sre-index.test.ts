import { DSHPulumiConfig } from '../src/config/pulumi-config';
import { allocateSreIndex, recordedSreIndex, sreIndexConfigKey } from '../src/infrastructure/sre-index';

function configWithIndexes(indexes: Record<string, unknown>): DSHPulumiConfig {
  const config = new DSHPulumiConfig();
  config.createOrSelectProject('shm');
  for (const [projectName, index] of Object.entries(indexes)) {
    config.createOrSelectProject(projectName).stack_config[sreIndexConfigKey(projectName)] = index;
  }
  return config;
}

describe('SRE index allocation', () => {
  test('stores the index under a project-scoped key', () => {
    expect(sreIndexConfigKey('sre-sandbox')).toBe('sre-sandbox:sre-index');
  });

  test('reads string and numeric indexes', () => {
    const config = configWithIndexes({ 'sre-a': '1', 'sre-b': 3, 'sre-c': 'seven' });
    expect(recordedSreIndex(config, 'sre-a')).toBe(1);
    expect(recordedSreIndex(config, 'sre-b')).toBe(3);
    expect(recordedSreIndex(config, 'sre-c')).toBeNull();
    expect(recordedSreIndex(config, 'shm')).toBeNull();
  });

  test('starts at one', () => {
    expect(allocateSreIndex(new DSHPulumiConfig(), 'sre-first')).toBe(1);
  });

  test('keeps the index of a redeployed SRE', () => {
    const config = configWithIndexes({ 'sre-a': '1', 'sre-b': '3' });
    expect(allocateSreIndex(config, 'sre-a')).toBe(1);
  });

  test('gives a new SRE the next index after the highest in use', () => {
    const config = configWithIndexes({ 'sre-a': '1', 'sre-b': '3' });
    expect(allocateSreIndex(config, 'sre-new')).toBe(4);
  });

  test('refuses to go beyond the last network', () => {
    const config = configWithIndexes({ 'sre-last': '255' });
    expect(() => allocateSreIndex(config, 'sre-new')).toThrow('Cannot deploy more than 255 SREs in one context.');
  });
});
