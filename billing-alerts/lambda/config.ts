import { z } from 'zod';

import { contextNumber, contextString } from '../../shared/lib/context';
import { ConfigurationError } from '../../shared/lib/errors';

const envSchema = z.object({
  WEBHOOK_URL: z.string({ required_error: 'WEBHOOK_URL is required' }).url(),
  MAX_SERVICES: contextNumber(z.number().int().min(1)).default(10),
  MIN_SERVICE_COST: contextNumber(z.number().min(0)).default(0.01),
  ALERT_THRESHOLD: contextNumber(z.number().positive().optional()),
  COST_EXPLORER_REGION: contextString(z.string()).default('us-east-1'),
});

export interface BillingAlertConfig {
  readonly webhookUrl: string;
  /** Services listed in the message */
  readonly maxServices: number;
  /** Services at or below this cost are left out */
  readonly minServiceCost: number;
  readonly alertThreshold?: number;
  readonly costExplorerRegion: string;
}

/**
 * Read the function configuration from its environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BillingAlertConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw ConfigurationError.fromZodError(result.error, 'Invalid billing alert environment');
  }
  const parsed = result.data;
  return {
    webhookUrl: parsed.WEBHOOK_URL,
    maxServices: parsed.MAX_SERVICES,
    minServiceCost: parsed.MIN_SERVICE_COST,
    alertThreshold: parsed.ALERT_THRESHOLD,
    costExplorerRegion: parsed.COST_EXPLORER_REGION,
  };
}
