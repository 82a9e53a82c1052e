#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';

import { stackId } from '../../shared/lib/naming';
import { applyStandardTags } from '../../shared/lib/tagging';
import { loadBillingAlertsConfig } from '../lib/billing-alerts-config';
import { BillingAlertsStack } from '../lib/billing-alerts-stack';

/**
 * Billing Alerts
 *
 * Scheduled Lambda that posts month-to-date AWS costs, broken down by
 * service, to a Slack-compatible incoming webhook.
 *
 * Deploy with the webhook URL supplied as context:
 *   cdk deploy -c webhookUrl=https://hooks.slack.com/services/...
 */

const app = new cdk.App();
const config = loadBillingAlertsConfig(app.node);

const stack = new BillingAlertsStack(app, stackId('BillingAlerts', config.environment), {
  env: {
    region: config.region,
    account: process.env.CDK_DEFAULT_ACCOUNT,
  },
  description: 'Scheduled AWS billing alerts (Cost Explorer → webhook)',
  config,
});
applyStandardTags(stack, { projectName: config.projectName, environment: config.environment, tier: 'serverless' });

app.synth();
