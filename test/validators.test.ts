/**
 * Tests for the config value validators
 */
import {
  aadGuid,
  azureLocation,
  azureSubscriptionName,
  azureVmSku,
  configName,
  emailAddress,
  fqdn,
  ipAddress,
  timezone,
  uniqueList,
} from '../src/utils/validators';

describe('aadGuid', () => {
  test('accepts lower and upper case GUIDs', () => {
    expect(aadGuid('d5c5c439-1115-4cb6-ab50-b8e547b6c8dd')).toBe('d5c5c439-1115-4cb6-ab50-b8e547b6c8dd');
    expect(aadGuid('D5C5C439-1115-4CB6-AB50-B8E547B6C8DD')).toBe('D5C5C439-1115-4CB6-AB50-B8E547B6C8DD');
  });

  test('rejects anything else', () => {
    expect(() => aadGuid('not-a-guid')).toThrow(
      "Expected GUID, for example 'd5c5c439-1115-4cb6-ab50-b8e547b6c8dd'."
    );
    expect(() => aadGuid('d5c5c439-1115-4cb6-ab50-b8e547b6c8d')).toThrow('Expected GUID');
  });
});

describe('azureLocation', () => {
  test.each(['uksouth', 'eastus2', 'westeurope'])('accepts %s', (location) => {
    expect(azureLocation(location)).toBe(location);
  });

  test.each(['UK South', 'uk-south', '2east'])('rejects %s', (location) => {
    expect(() => azureLocation(location)).toThrow("Expected valid Azure location, for example 'uksouth'.");
  });
});

describe('azureSubscriptionName', () => {
  test('accepts letters, digits, spaces and hyphens', () => {
    expect(azureSubscriptionName('Data Safe Haven - Dev 1')).toBe('Data Safe Haven - Dev 1');
  });

  test.each(['1st subscription', 'trailing-', 'under_score'])('rejects %s', (name) => {
    expect(() => azureSubscriptionName(name)).toThrow(
      'Azure subscription names can only contain alphanumeric characters, spaces and particular special characters.'
    );
  });
});

describe('azureVmSku', () => {
  test('accepts Standard and Basic SKUs', () => {
    expect(azureVmSku('Standard_D2s_v3')).toBe('Standard_D2s_v3');
    expect(azureVmSku('Basic_A1')).toBe('Basic_A1');
  });

  test('rejects other prefixes', () => {
    expect(() => azureVmSku('Premium_D2s')).toThrow("Expected valid Azure VM SKU, for example 'Standard_D2s_v4'.");
  });
});

describe('configName', () => {
  test('accepts names with spaces and hyphens inside', () => {
    expect(configName('Acme Deployment-2')).toBe('Acme Deployment-2');
  });

  test('rejects names that start or end with a separator', () => {
    expect(() => configName('-acme')).toThrow(
      'DSH config names can only contain alphanumeric characters, spaces and hyphens.\n' +
        'They must start and end with alphanumeric characters.'
    );
    expect(() => configName('acme ')).toThrow('DSH config names');
    expect(() => configName('acme_corp')).toThrow('DSH config names');
  });
});

describe('emailAddress', () => {
  test('accepts a plain address', () => {
    expect(emailAddress('ada.lovelace@example.com')).toBe('ada.lovelace@example.com');
  });

  test.each(['no-at-sign', '@example.com', 'ada@localhost', 'ada lovelace@example.com'])('rejects %s', (value) => {
    expect(() => emailAddress(value)).toThrow("Expected valid email address, for example 'sherlock@holmes.com'.");
  });
});

describe('fqdn', () => {
  test('accepts multi-label names with an optional trailing dot', () => {
    expect(fqdn('sre.example.com')).toBe('sre.example.com');
    expect(fqdn('Example.ORG.')).toBe('Example.ORG.');
  });

  test.each(['localhost', '-bad.example.com', 'bad-.example.com', 'under_score.example.com'])(
    'rejects %s',
    (value) => {
      expect(() => fqdn(value)).toThrow("Expected valid fully qualified domain name, for example 'example.com'.");
    }
  );
});

describe('ipAddress', () => {
  test('turns bare addresses into /32 networks', () => {
    expect(ipAddress('1.2.3.4')).toBe('1.2.3.4/32');
  });

  test('keeps valid networks', () => {
    expect(ipAddress('10.0.0.0/8')).toBe('10.0.0.0/8');
    expect(ipAddress(' 192.168.1.0/24 ')).toBe('192.168.1.0/24');
  });

  test.each(['256.0.0.1', '10.0.0.1/8', '1.2.3.4/33', 'example.com'])('rejects %s', (value) => {
    expect(() => ipAddress(value)).toThrow("Expected valid IPv4 address, for example '1.1.1.1'.");
  });
});

describe('timezone', () => {
  test('accepts IANA zones', () => {
    expect(timezone('Europe/London')).toBe('Europe/London');
    expect(timezone('Etc/UTC')).toBe('Etc/UTC');
  });

  test('rejects unknown zones', () => {
    expect(() => timezone('Mars/Olympus_Mons')).toThrow("Expected valid timezone, for example 'Europe/London'.");
  });
});

describe('uniqueList', () => {
  test('returns distinct lists unchanged', () => {
    expect(uniqueList(['a', 'b'])).toEqual(['a', 'b']);
  });

  test('compares by key when given one', () => {
    expect(() => uniqueList([{ id: 1 }, { id: 1 }], (item) => item.id)).toThrow('All items must be unique.');
  });

  test('rejects duplicates', () => {
    expect(() => uniqueList(['a', 'a'])).toThrow('All items must be unique.');
  });
});
