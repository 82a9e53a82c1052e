import { ConfigurationError } from '../lib/errors';
import { loadTierConfig, parseTierConfig, TIER_CONFIG_KEYS } from '../lib/tier-config';
import type { ContextSource } from '../lib/context';

function contextOf(values: Record<string, unknown>): ContextSource {
  return { tryGetContext: (key: string) => values[key] };
}

function issuesOf(raw: Record<string, unknown>): readonly string[] {
  try {
    parseTierConfig(raw);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected parseTierConfig to fail');
}

describe('parseTierConfig', () => {
  test('fills in defaults', () => {
    const config = parseTierConfig({ projectName: 'demo' });

    expect(config).toMatchObject({
      projectName: 'demo',
      environment: 'development',
      region: 'us-east-1',
      vpcCidr: '10.0.0.0/16',
      maxAzs: 2,
      subnetCidrMask: 24,
      natGateways: 1,
      instanceType: 't3.micro',
      appInstanceType: 't3.small',
      minCapacity: 1,
      desiredCapacity: 2,
      maxCapacity: 4,
      dbAllocatedStorage: 20,
      dbMultiAz: false,
    });
    expect(config.adminCidr).toBeUndefined();
  });

  test('coerces -c string overrides', () => {
    const config = parseTierConfig({
      projectName: 'demo',
      maxAzs: '3',
      natGateways: '0',
      dbMultiAz: 'true',
      adminCidr: '',
    });

    expect(config.maxAzs).toBe(3);
    expect(config.natGateways).toBe(0);
    expect(config.dbMultiAz).toBe(true);
    expect(config.adminCidr).toBeUndefined();
  });

  test('reports every failing key', () => {
    const issues = issuesOf({ projectName: 'Demo', maxAzs: 5 });

    expect(issues).toEqual([
      'projectName: must be 2-31 lowercase letters, digits or hyphens',
      expect.stringMatching(/^maxAzs: /),
    ]);
  });

  test('rejects a VPC CIDR with host bits', () => {
    expect(issuesOf({ projectName: 'demo', vpcCidr: '10.0.1.0/16' })).toEqual([
      'vpcCidr: CIDR 10.0.1.0/16 has host bits set. Use the network address',
    ]);
  });

  test('requires min <= desired <= max', () => {
    expect(issuesOf({ projectName: 'demo', minCapacity: 3, desiredCapacity: 2 })).toEqual([
      'desiredCapacity: capacity must satisfy min <= desired <= max (got 3/2/4)',
    ]);
  });

  test('requires subnets no larger than the VPC', () => {
    expect(issuesOf({ projectName: 'demo', vpcCidr: '10.0.0.0/20', subnetCidrMask: 16 })).toEqual([
      'subnetCidrMask: /16 subnets do not fit inside 10.0.0.0/20',
    ]);
  });

  test('accepts a subnet as large as the VPC', () => {
    const config = parseTierConfig({ projectName: 'demo', vpcCidr: '10.0.0.0/24', subnetCidrMask: 24, maxAzs: 1 });

    expect(config.subnetCidrMask).toBe(24);
  });

  test('rejects an admin CIDR inside the VPC', () => {
    expect(issuesOf({ projectName: 'demo', adminCidr: '10.0.5.0/24' })).toEqual([
      'adminCidr: 10.0.5.0/24 lies inside the VPC 10.0.0.0/16; use an address outside it',
    ]);
    expect(parseTierConfig({ projectName: 'demo', adminCidr: '203.0.113.0/24' }).adminCidr).toBe('203.0.113.0/24');
  });

  test('requires domainName and hostedZoneId together', () => {
    expect(issuesOf({ projectName: 'demo', domainName: 'example.com' })).toEqual([
      'hostedZoneId: domainName and hostedZoneId must be set together',
    ]);
  });

  test('blocks open SSH in production', () => {
    expect(issuesOf({ projectName: 'demo', environment: 'production', adminCidr: '0.0.0.0/0' })).toEqual([
      'adminCidr: SSH from 0.0.0.0/0 is not allowed in production',
    ]);
    expect(parseTierConfig({ projectName: 'demo', adminCidr: '0.0.0.0/0' }).adminCidr).toBe('0.0.0.0/0');
  });

  test('error message lists the issues', () => {
    expect(() => parseTierConfig({ projectName: 'demo', domainName: 'example.com' })).toThrow(
      'Invalid tier configuration:\n  - hostedZoneId: domainName and hostedZoneId must be set together'
    );
  });
});

describe('loadTierConfig', () => {
  test('context values override template defaults', () => {
    const config = loadTierConfig(contextOf({ projectName: 'ctx-app', maxAzs: '1' }), {
      vpcCidr: '10.10.0.0/16',
      maxAzs: 2,
    });

    expect(config.projectName).toBe('ctx-app');
    expect(config.maxAzs).toBe(1);
    expect(config.vpcCidr).toBe('10.10.0.0/16');
  });

  test('reads only known keys', () => {
    expect(TIER_CONFIG_KEYS).toContain('vpcCidr');
    expect(TIER_CONFIG_KEYS).not.toContain('webhookUrl');
  });
});
