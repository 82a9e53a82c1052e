#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';

import { stackId } from '../../shared/lib/naming';
import { applyStandardTags } from '../../shared/lib/tagging';
import { loadTierConfig } from '../../shared/lib/tier-config';
import { Aws3TierAppStack } from '../lib/aws-3tier-app-stack';

/**
 * AWS 3-Tier Application
 *
 * Presentation Tier:
 * - WAF (Web Application Firewall)
 * - ALB (public) → nginx Auto Scaling group (web subnets)
 * - Route 53 (DNS - optional)
 *
 * Application Tier:
 * - Internal ALB → FastAPI Auto Scaling group (app subnets)
 *
 * Data Tier:
 * - RDS PostgreSQL (isolated subnets)
 * - Secrets Manager (credential management)
 *
 * Network:
 * - VPC with public, web, app and database subnets
 * - NAT Gateway for web/app subnet internet access
 * - Security groups chained tier to tier
 */

const app = new cdk.App();
const config = loadTierConfig(app.node, { projectName: 'aws-3tier' });

const stack = new Aws3TierAppStack(app, stackId('Aws3TierApp', config.environment), {
  env: {
    region: config.region,
    account: process.env.CDK_DEFAULT_ACCOUNT,
  },
  description: 'AWS 3-Tier Application with WAF, ALB, EC2 Auto Scaling web/app tiers, RDS PostgreSQL',
  config,
});
applyStandardTags(stack, { projectName: config.projectName, environment: config.environment, tier: '3-tier' });

app.synth();
