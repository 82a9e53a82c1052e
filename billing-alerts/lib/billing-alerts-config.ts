import { z } from 'zod';

import { contextNumber, contextString, readContext, type ContextSource } from '../../shared/lib/context';
import { ConfigurationError } from '../../shared/lib/errors';
import { ENVIRONMENTS } from '../../shared/lib/tier-config';

const billingAlertsConfigShape = z.object({
  projectName: z
    .string()
    .regex(/^[a-z][a-z0-9-]{1,30}$/, 'must be 2-31 lowercase letters, digits or hyphens')
    .default('billing-alerts'),
  environment: z.enum(ENVIRONMENTS).default('development'),
  // Cost Explorer is served from us-east-1; deploy beside it
  region: z.string().default('us-east-1'),
  webhookUrl: z
    .string({ required_error: 'is required (cdk deploy -c webhookUrl=https://...)' })
    .url()
    .refine((url) => url.startsWith('https://'), 'must use https'),
  scheduleExpression: z
    .string()
    .regex(/^(cron|rate)\(.+\)$/, 'must be an EventBridge cron(...) or rate(...) expression')
    .default('cron(0 9 * * ? *)'),
  maxServices: contextNumber(z.number().int().min(1).max(50)).default(10),
  minServiceCost: contextNumber(z.number().min(0)).default(0.01),
  alertThreshold: contextNumber(z.number().positive().optional()),
  alertEmail: contextString(z.string().email().optional()),
});

export type BillingAlertsConfig = z.infer<typeof billingAlertsConfigShape>;

export const BILLING_ALERTS_CONFIG_KEYS = Object.keys(billingAlertsConfigShape.shape);

export function parseBillingAlertsConfig(raw: unknown): BillingAlertsConfig {
  const result = billingAlertsConfigShape.safeParse(raw);
  if (!result.success) {
    throw ConfigurationError.fromZodError(result.error, 'Invalid billing alerts configuration');
  }
  return result.data;
}

export function loadBillingAlertsConfig(source: ContextSource): BillingAlertsConfig {
  return parseBillingAlertsConfig(readContext(source, BILLING_ALERTS_CONFIG_KEYS));
}
