import {
  CostExplorerClient,
  GetCostAndUsageCommand,
  type GetCostAndUsageCommandOutput,
} from '@aws-sdk/client-cost-explorer';
import { mockClient } from 'aws-sdk-client-mock';
import 'aws-sdk-client-mock-jest';
import nock from 'nock';

import { createHandler, handler } from '../lambda/billing-alert';
import { createLogger } from '../lambda/logger';

const ceMock = mockClient(CostExplorerClient);

const WEBHOOK_HOST = 'https://hooks.example.com';
const WEBHOOK_PATH = '/services/T000/B000/test-secret';

interface PostedMessage {
  blocks: Array<{ type: string; text?: { text: string } }>;
}

function isPostedMessage(body: unknown): body is PostedMessage {
  return typeof body === 'object' && body !== null && 'blocks' in body && Array.isArray(body.blocks);
}

function capturingLogger(lines: string[]) {
  const destination = {
    write(line: string): void {
      lines.push(line);
    },
  };
  return createLogger(destination, 'debug');
}

function costOutput(withServices: boolean): GetCostAndUsageCommandOutput {
  if (!withServices) {
    return {
      $metadata: {},
      ResultsByTime: [{ Total: { UnblendedCost: { Amount: '42', Unit: 'USD' } } }],
    };
  }
  return {
    $metadata: {},
    ResultsByTime: [
      {
        Groups: [
          { Keys: ['Amazon Virtual Private Cloud'], Metrics: { UnblendedCost: { Amount: '32', Unit: 'USD' } } },
          { Keys: ['Amazon Simple Notification Service'], Metrics: { UnblendedCost: { Amount: '10', Unit: 'USD' } } },
        ],
      },
    ],
  };
}

describe('billing alert handler', () => {
  const originalEnv = process.env;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  beforeEach(() => {
    ceMock.reset();
    ceMock.on(GetCostAndUsageCommand).callsFake((input) => costOutput(input.GroupBy !== undefined));
    process.env = {
      LOG_LEVEL: 'silent',
      WEBHOOK_URL: `${WEBHOOK_HOST}${WEBHOOK_PATH}`,
    };
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    process.env = originalEnv;
    nock.enableNetConnect();
  });

  test('posts the report and returns 200', async () => {
    let posted: unknown;
    const scope = nock(WEBHOOK_HOST)
      .post(WEBHOOK_PATH, (body: unknown) => {
        posted = body;
        return true;
      })
      .reply(200, 'ok');

    const response = await handler();

    expect(response).toEqual({
      statusCode: 200,
      body: JSON.stringify('Billing alert sent successfully'),
    });
    expect(scope.isDone()).toBe(true);
    expect(ceMock).toHaveReceivedCommandTimes(GetCostAndUsageCommand, 2);

    if (!isPostedMessage(posted)) {
      throw new Error('webhook received no message');
    }
    expect(posted.blocks.map((block) => block.type)).toEqual(['header', 'section', 'section']);
    expect(posted.blocks[1].text?.text).toMatch(
      /^\*Total Cost:\* \$42\.00\n\*Period:\* \d{4}-\d{2}-\d{2} to \d{4}-\d{2}-\d{2}$/
    );
    expect(posted.blocks[2].text?.text).toBe(
      '*Top Services:*\n• Amazon Virtual Private Cloud: $32.00\n• Amazon Simple Notification Service: $10.00\n'
    );
  });

  test('honours MAX_SERVICES and ALERT_THRESHOLD', async () => {
    process.env.MAX_SERVICES = '1';
    process.env.ALERT_THRESHOLD = '40';
    let posted: unknown;
    nock(WEBHOOK_HOST)
      .post(WEBHOOK_PATH, (body: unknown) => {
        posted = body;
        return true;
      })
      .reply(200, 'ok');

    const response = await handler();

    expect(response.statusCode).toBe(200);
    if (!isPostedMessage(posted)) {
      throw new Error('webhook received no message');
    }
    expect(posted.blocks[0].text?.text).toBe('🚨 AWS Billing Alert: threshold exceeded');
    expect(posted.blocks[3].text?.text).toBe('*Top Services:*\n• Amazon Virtual Private Cloud: $32.00\n');
  });

  test('returns 500 when the webhook rejects the message', async () => {
    nock(WEBHOOK_HOST).post(WEBHOOK_PATH).reply(500, 'internal_error');

    const response = await handler();

    expect(response).toEqual({
      statusCode: 500,
      body: JSON.stringify('Error: Webhook failed with status 500'),
    });
  });

  test('logs the total once the message is delivered', async () => {
    const lines: string[] = [];
    nock(WEBHOOK_HOST).post(WEBHOOK_PATH).reply(200, 'ok');

    const response = await createHandler({ logger: capturingLogger(lines) })();

    expect(response.statusCode).toBe(200);
    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(entries).toContainEqual(
      expect.objectContaining({
        level: 'info',
        service: 'billing-alerts',
        msg: 'Billing alert sent successfully. Total cost: $42.00',
        totalCost: 42,
        services: 2,
      })
    );
  });

  test('keeps the webhook URL out of logs when the request fails', async () => {
    const lines: string[] = [];
    nock(WEBHOOK_HOST).post(WEBHOOK_PATH).replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    const response = await createHandler({ logger: capturingLogger(lines) })();

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toMatch(/^Error: Webhook request failed: /);
    expect(lines.some((line) => line.includes('"msg":"Billing alert failed"'))).toBe(true);
    expect(lines.filter((line) => line.includes(WEBHOOK_PATH))).toEqual([]);
  });

  test('returns 500 when Cost Explorer fails', async () => {
    ceMock.on(GetCostAndUsageCommand).rejects(new Error('User is not authorized to perform ce:GetCostAndUsage'));

    const response = await handler();

    expect(response).toEqual({
      statusCode: 500,
      body: JSON.stringify('Error: User is not authorized to perform ce:GetCostAndUsage'),
    });
  });

  test('returns 500 without a webhook URL', async () => {
    delete process.env.WEBHOOK_URL;

    const response = await handler();

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toBe(
      'Error: Invalid billing alert environment:\n  - WEBHOOK_URL: WEBHOOK_URL is required'
    );
    expect(ceMock).toHaveReceivedCommandTimes(GetCostAndUsageCommand, 0);
  });
});
