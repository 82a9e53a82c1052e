/**
 * Stack and resource naming conventions shared by every template.
 *
 * Stack name pattern: {Template}-{environment}
 *   e.g. Aws3TierApp-production
 * Resource name pattern: {project}-{env}-{suffix}
 *   e.g. aws-3tier-prod-waf
 */

import type { EnvironmentName } from './tier-config';

const ENVIRONMENT_SHORT_NAMES: Record<EnvironmentName, string> = {
  development: 'dev',
  staging: 'stg',
  production: 'prod',
};

/**
 * CDK construct ID / CloudFormation stack name
 */
export function stackId(template: string, environment: EnvironmentName): string {
  return `${template}-${environment}`;
}

/**
 * Lowercase physical resource name, cut to `maxLength` when a service limits it
 *
 * @example
 * resourceName('aws-3tier', 'production', 'waf') // → 'aws-3tier-prod-waf'
 */
export function resourceName(
  projectName: string,
  environment: EnvironmentName,
  suffix: string,
  maxLength?: number,
): string {
  const name = `${projectName}-${ENVIRONMENT_SHORT_NAMES[environment]}-${suffix}`.toLowerCase();
  if (maxLength === undefined || name.length <= maxLength) {
    return name;
  }
  return name.substring(0, maxLength).replace(/-+$/, '');
}

/**
 * CloudWatch Logs group name for a Lambda function
 */
export function lambdaLogGroupName(functionName: string): string {
  return `/aws/lambda/${functionName}`;
}
