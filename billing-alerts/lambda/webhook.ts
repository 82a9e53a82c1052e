import axios from 'axios';

import type { BillingData } from './cost-report';
import { WebhookDeliveryError } from './errors';

/**
 * Slack Block Kit subset used by the billing message. Teams and Discord
 * Slack-compatible endpoints accept the same payload.
 */
export interface TextObject {
  readonly type: 'plain_text' | 'mrkdwn';
  readonly text: string;
}

export type Block =
  | { readonly type: 'header'; readonly text: TextObject }
  | { readonly type: 'section'; readonly text: TextObject }
  | { readonly type: 'context'; readonly elements: TextObject[] };

export interface WebhookMessage {
  readonly blocks: Block[];
}

export interface MessageOptions {
  /** @default 10 */
  readonly maxServices?: number;
  /** Total above which the header turns into a warning */
  readonly alertThreshold?: number;
}

export const DEFAULT_HEADER = '🏦 AWS Billing Alert';
export const THRESHOLD_HEADER = '🚨 AWS Billing Alert: threshold exceeded';

export function formatCost(amount: number, currency = 'USD'): string {
  return currency === 'USD' ? `$${amount.toFixed(2)}` : `${amount.toFixed(2)} ${currency}`;
}

export function buildWebhookMessage(data: BillingData, options: MessageOptions = {}): WebhookMessage {
  const { maxServices = 10, alertThreshold } = options;
  const exceeded = alertThreshold !== undefined && data.totalCost > alertThreshold;

  const blocks: Block[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: exceeded ? THRESHOLD_HEADER : DEFAULT_HEADER },
    },
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*Total Cost:* ${formatCost(data.totalCost, data.currency)}\n*Period:* ${data.period}`,
      },
    },
  ];

  if (exceeded) {
    blocks.push({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: `Alert threshold: ${formatCost(alertThreshold, data.currency)}` }],
    });
  }

  if (data.serviceCosts.length > 0) {
    const lines = data.serviceCosts
      .slice(0, maxServices)
      .map(({ service, cost }) => `• ${service}: ${formatCost(cost, data.currency)}\n`);
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: `*Top Services:*\n${lines.join('')}` },
    });
  }

  return { blocks };
}

/**
 * POST the message as JSON; anything but 200 is a delivery failure,
 * reported as WebhookDeliveryError
 */
export async function sendWebhookNotification(url: string, message: WebhookMessage): Promise<void> {
  let status: number;
  try {
    const response = await axios.post(url, message, {
      headers: { 'Content-Type': 'application/json' },
      timeout: 10_000,
      validateStatus: () => true,
    });
    status = response.status;
  } catch (error) {
    // AxiosError holds the request config and socket, both with the webhook URL
    if (axios.isAxiosError(error)) {
      throw new WebhookDeliveryError(error.response?.status, error.code);
    }
    throw error;
  }

  if (status !== 200) {
    throw new WebhookDeliveryError(status);
  }
}
