#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';

import { stackId } from '../../shared/lib/naming';
import { applyStandardTags } from '../../shared/lib/tagging';
import { loadTierConfig } from '../../shared/lib/tier-config';
import { Aws1TierAppStack } from '../lib/aws-1tier-app-stack';

/**
 * AWS 1-Tier Application
 *
 * A single EC2 instance in a public subnet running the web server,
 * application and database together.
 *
 * Configuration comes from the context block in cdk.json; override any
 * key with `cdk deploy -c key=value` (e.g. -c adminCidr=203.0.113.10/32).
 */

const app = new cdk.App();
const config = loadTierConfig(app.node, { projectName: 'aws-1tier' });

const stack = new Aws1TierAppStack(app, stackId('Aws1TierApp', config.environment), {
  env: {
    region: config.region,
    account: process.env.CDK_DEFAULT_ACCOUNT,
  },
  description: 'AWS 1-Tier Application - single EC2 web server with local database',
  config,
});
applyStandardTags(stack, { projectName: config.projectName, environment: config.environment, tier: '1-tier' });

app.synth();
