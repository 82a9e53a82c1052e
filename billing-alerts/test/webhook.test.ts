import nock from 'nock';

import type { BillingData } from '../lambda/cost-report';
import { WebhookDeliveryError } from '../lambda/errors';
import {
  buildWebhookMessage,
  formatCost,
  sendWebhookNotification,
  type WebhookMessage,
} from '../lambda/webhook';

const WEBHOOK_HOST = 'https://hooks.example.com';
const WEBHOOK_PATH = '/services/T000/B000/test-hook';

const data: BillingData = {
  totalCost: 123.4,
  currency: 'USD',
  serviceCosts: [
    { service: 'Amazon Elastic Compute Cloud - Compute', cost: 80.5 },
    { service: 'Amazon Relational Database Service', cost: 30 },
  ],
  period: '2026-03-01 to 2026-03-15',
};

describe('formatCost', () => {
  test('formats USD with a dollar sign and two decimals', () => {
    expect(formatCost(7)).toBe('$7.00');
  });

  test('suffixes other currencies', () => {
    expect(formatCost(5, 'EUR')).toBe('5.00 EUR');
  });
});

describe('buildWebhookMessage', () => {
  test('builds header, total and service breakdown blocks', () => {
    expect(buildWebhookMessage(data)).toEqual({
      blocks: [
        { type: 'header', text: { type: 'plain_text', text: '🏦 AWS Billing Alert' } },
        {
          type: 'section',
          text: { type: 'mrkdwn', text: '*Total Cost:* $123.40\n*Period:* 2026-03-01 to 2026-03-15' },
        },
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text:
              '*Top Services:*\n' +
              '• Amazon Elastic Compute Cloud - Compute: $80.50\n' +
              '• Amazon Relational Database Service: $30.00\n',
          },
        },
      ],
    });
  });

  test('omits the breakdown when no service has cost', () => {
    const message = buildWebhookMessage({ ...data, totalCost: 0, serviceCosts: [] });

    expect(message.blocks).toHaveLength(2);
  });

  test('lists at most maxServices services', () => {
    const message = buildWebhookMessage(data, { maxServices: 1 });

    expect(message.blocks[2]).toEqual({
      type: 'section',
      text: { type: 'mrkdwn', text: '*Top Services:*\n• Amazon Elastic Compute Cloud - Compute: $80.50\n' },
    });
  });

  test('flags totals above the alert threshold', () => {
    const message = buildWebhookMessage(data, { alertThreshold: 100 });

    expect(message.blocks[0]).toEqual({
      type: 'header',
      text: { type: 'plain_text', text: '🚨 AWS Billing Alert: threshold exceeded' },
    });
    expect(message.blocks[2]).toEqual({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: 'Alert threshold: $100.00' }],
    });
    expect(message.blocks).toHaveLength(4);
  });

  test('keeps the normal header below the threshold', () => {
    const message = buildWebhookMessage(data, { alertThreshold: 200 });

    expect(message.blocks[0]).toEqual({
      type: 'header',
      text: { type: 'plain_text', text: '🏦 AWS Billing Alert' },
    });
    expect(message.blocks).toHaveLength(3);
  });
});

describe('sendWebhookNotification', () => {
  const message: WebhookMessage = buildWebhookMessage(data);

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  test('posts the message as JSON', async () => {
    const scope = nock(WEBHOOK_HOST)
      .post(WEBHOOK_PATH, JSON.parse(JSON.stringify(message)))
      .matchHeader('content-type', 'application/json')
      .reply(200, 'ok');

    await sendWebhookNotification(`${WEBHOOK_HOST}${WEBHOOK_PATH}`, message);

    expect(scope.isDone()).toBe(true);
  });

  test('throws WebhookDeliveryError on a non-200 response', async () => {
    nock(WEBHOOK_HOST).post(WEBHOOK_PATH).reply(500, 'internal_error');

    const sending = sendWebhookNotification(`${WEBHOOK_HOST}${WEBHOOK_PATH}`, message);

    await expect(sending).rejects.toBeInstanceOf(WebhookDeliveryError);
    await expect(sending).rejects.toMatchObject({
      status: 500,
      message: 'Webhook failed with status 500',
    });
  });

  test('reports unreachable webhooks without the request details', async () => {
    nock(WEBHOOK_HOST).post(WEBHOOK_PATH).replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    const error: unknown = await sendWebhookNotification(`${WEBHOOK_HOST}${WEBHOOK_PATH}`, message).then(
      () => undefined,
      (rejection: unknown) => rejection
    );

    expect(error).toBeInstanceOf(WebhookDeliveryError);
    expect(error).toMatchObject({ name: 'WebhookDeliveryError', status: undefined });
    expect(JSON.stringify(error)).not.toContain(WEBHOOK_PATH);
    expect(Object.keys(error ?? {})).toEqual(['name', 'status', 'code']);
  });

  test('treats other 2xx responses as failures', async () => {
    nock(WEBHOOK_HOST).post(WEBHOOK_PATH).reply(204);

    await expect(
      sendWebhookNotification(`${WEBHOOK_HOST}${WEBHOOK_PATH}`, message)
    ).rejects.toMatchObject({ status: 204 });
  });
});
