import { lambdaLogGroupName, resourceName, stackId } from '../lib/naming';

describe('naming', () => {
  test('stackId', () => {
    expect(stackId('Aws3TierApp', 'production')).toBe('Aws3TierApp-production');
  });

  test('resourceName abbreviates the environment', () => {
    expect(resourceName('aws-3tier', 'production', 'waf')).toBe('aws-3tier-prod-waf');
    expect(resourceName('Demo', 'staging', 'DB')).toBe('demo-stg-db');
  });

  test('resourceName truncates without a trailing hyphen', () => {
    expect(resourceName('abcdefgh', 'development', 'x-y', 13)).toBe('abcdefgh-dev');
    expect(resourceName('abc', 'development', 'web', 32)).toBe('abc-dev-web');
  });

  test('lambdaLogGroupName', () => {
    expect(lambdaLogGroupName('demo-dev-billing-alert')).toBe('/aws/lambda/demo-dev-billing-alert');
  });
});
