import { z } from 'zod';

import { cidrSchema, contextBoolean, contextNumber, contextString, readContext, type ContextSource } from './context';
import { ConfigurationError } from './errors';
import { cidrContains, cidrPrefix } from './validation';

export const ENVIRONMENTS = ['development', 'staging', 'production'] as const;
export type EnvironmentName = (typeof ENVIRONMENTS)[number];

const INSTANCE_TYPE_PATTERN = /^[a-z][a-z0-9-]*\.[a-z0-9]+$/;

const instanceType = z
  .string()
  .regex(INSTANCE_TYPE_PATTERN, 'must be an EC2 instance type such as t3.micro');

const tierConfigShape = z.object({
  projectName: z
    .string()
    .regex(/^[a-z][a-z0-9-]{1,30}$/, 'must be 2-31 lowercase letters, digits or hyphens'),
  environment: z.enum(ENVIRONMENTS).default('development'),
  region: z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d$/, 'must be an AWS region such as us-east-1').default('us-east-1'),

  // Network
  vpcCidr: cidrSchema.default('10.0.0.0/16'),
  maxAzs: contextNumber(z.number().int().min(1).max(3)).default(2),
  subnetCidrMask: contextNumber(z.number().int().min(16).max(28)).default(24),
  natGateways: contextNumber(z.number().int().min(0).max(3)).default(1),
  adminCidr: contextString(cidrSchema.optional()),

  // Compute
  instanceType: instanceType.default('t3.micro'),
  appInstanceType: instanceType.default('t3.small'),
  minCapacity: contextNumber(z.number().int().min(0)).default(1),
  desiredCapacity: contextNumber(z.number().int().min(0)).default(2),
  maxCapacity: contextNumber(z.number().int().min(1)).default(4),

  // Database
  dbInstanceType: instanceType.default('t3.micro'),
  dbAllocatedStorage: contextNumber(z.number().int().min(20).max(16384)).default(20),
  dbMultiAz: contextBoolean(z.boolean()).default(false),

  // DNS (optional)
  domainName: contextString(z.string().min(3).optional()),
  hostedZoneId: contextString(z.string().regex(/^Z[A-Z0-9]+$/, 'must be a Route 53 hosted zone ID').optional()),

  alertEmail: contextString(z.string().email().optional()),
});

export const tierConfigSchema = tierConfigShape.superRefine((config, ctx) => {
  if (config.minCapacity > config.desiredCapacity || config.desiredCapacity > config.maxCapacity) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['desiredCapacity'],
      message: `capacity must satisfy min <= desired <= max (got ${config.minCapacity}/${config.desiredCapacity}/${config.maxCapacity})`,
    });
  }

  if (config.subnetCidrMask < cidrPrefix(config.vpcCidr)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['subnetCidrMask'],
      message: `/${config.subnetCidrMask} subnets do not fit inside ${config.vpcCidr}`,
    });
  }

  if ((config.domainName === undefined) !== (config.hostedZoneId === undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['hostedZoneId'],
      message: 'domainName and hostedZoneId must be set together',
    });
  }

  if (config.environment === 'production' && config.adminCidr === '0.0.0.0/0') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['adminCidr'],
      message: 'SSH from 0.0.0.0/0 is not allowed in production',
    });
  }

  // In-VPC access goes through Session Manager
  if (config.adminCidr !== undefined && cidrContains(config.vpcCidr, config.adminCidr)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['adminCidr'],
      message: `${config.adminCidr} lies inside the VPC ${config.vpcCidr}; use an address outside it`,
    });
  }
});

export type TierConfig = z.infer<typeof tierConfigSchema>;

/** Keys read from CDK context */
export const TIER_CONFIG_KEYS = Object.keys(tierConfigShape.shape);

/**
 * Validate raw input; throws ConfigurationError listing every failing key
 */
export function parseTierConfig(raw: unknown): TierConfig {
  const result = tierConfigSchema.safeParse(raw);
  if (!result.success) {
    throw ConfigurationError.fromZodError(result.error, 'Invalid tier configuration');
  }
  return result.data;
}

/**
 * Load tier configuration from CDK context (cdk.json, then `-c` overrides)
 *
 * @param defaults - Per-template defaults applied beneath context values
 */
export function loadTierConfig(source: ContextSource, defaults: Partial<TierConfig> = {}): TierConfig {
  return parseTierConfig(readContext(source, TIER_CONFIG_KEYS, defaults));
}
