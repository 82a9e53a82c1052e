/**
 * Billing Alert Lambda Handler
 *
 * Invoked on an EventBridge schedule.
 *
 * Flow:
 * 1. Read configuration from the environment
 * 2. Query Cost Explorer for month-to-date total and per-service cost
 * 3. Build a Slack Block Kit message
 * 4. POST it to the webhook
 *
 * Environment Variables:
 * - WEBHOOK_URL: Incoming webhook (Slack, Teams, Discord...)
 * - MAX_SERVICES: (Optional) Services listed, default 10
 * - MIN_SERVICE_COST: (Optional) Services at or below this cost are skipped, default 0.01
 * - ALERT_THRESHOLD: (Optional) Total above which the message is flagged
 * - LOG_LEVEL: (Optional) pino log level, default info
 */

import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import type { Context, ScheduledEvent } from 'aws-lambda';
import type { Logger } from 'pino';

import { loadConfig } from './config';
import { getBillingData } from './cost-report';
import { logger } from './logger';
import { buildWebhookMessage, formatCost, sendWebhookNotification } from './webhook';

export interface BillingAlertResponse {
  readonly statusCode: number;
  readonly body: string;
}

const clients = new Map<string, CostExplorerClient>();

// Reused across warm invocations
function costExplorerClient(region: string): CostExplorerClient {
  let client = clients.get(region);
  if (!client) {
    client = new CostExplorerClient({ region });
    clients.set(region, client);
  }
  return client;
}

export type BillingAlertHandler = (event?: ScheduledEvent, context?: Context) => Promise<BillingAlertResponse>;

export interface BillingAlertDependencies {
  readonly logger?: Logger;
}

export function createHandler(dependencies: BillingAlertDependencies = {}): BillingAlertHandler {
  const baseLogger = dependencies.logger ?? logger;

  return async (_event, context) => {
    const log = baseLogger.child({ requestId: context?.awsRequestId });

    try {
      const config = loadConfig();
      const billingData = await getBillingData(costExplorerClient(config.costExplorerRegion), {
        minServiceCost: config.minServiceCost,
      });
      log.debug({ billingData }, 'Retrieved billing data');

      const message = buildWebhookMessage(billingData, config);
      await sendWebhookNotification(config.webhookUrl, message);

      log.info(
        { totalCost: billingData.totalCost, period: billingData.period, services: billingData.serviceCosts.length },
        `Billing alert sent successfully. Total cost: ${formatCost(billingData.totalCost, billingData.currency)}`,
      );
      return {
        statusCode: 200,
        body: JSON.stringify('Billing alert sent successfully'),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ err: error }, 'Billing alert failed');
      return {
        statusCode: 500,
        body: JSON.stringify(`Error: ${message}`),
      };
    }
  };
}

export const handler = createHandler();
