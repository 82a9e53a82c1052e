#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';

import { stackId } from '../../shared/lib/naming';
import { applyStandardTags } from '../../shared/lib/tagging';
import { loadTierConfig } from '../../shared/lib/tier-config';
import { Aws2TierAppStack } from '../lib/aws-2tier-app-stack';

/**
 * AWS 2-Tier Application
 *
 * Web Tier:
 * - ALB (Application Load Balancer)
 * - EC2 Auto Scaling group (nginx + PHP)
 *
 * Data Tier:
 * - RDS MySQL (isolated subnets)
 * - Secrets Manager (credential management)
 */

const app = new cdk.App();
const config = loadTierConfig(app.node, { projectName: 'aws-2tier' });

const stack = new Aws2TierAppStack(app, stackId('Aws2TierApp', config.environment), {
  env: {
    region: config.region,
    account: process.env.CDK_DEFAULT_ACCOUNT,
  },
  description: 'AWS 2-Tier Application with ALB, EC2 Auto Scaling, RDS MySQL',
  config,
});
applyStandardTags(stack, { projectName: config.projectName, environment: config.environment, tier: '2-tier' });

app.synth();
