import { z } from 'zod';

import { validateCidr } from './validation';

/**
 * Context values from cdk.json keep their JSON types, while `-c key=value`
 * overrides always arrive as strings. These preprocessors accept both.
 */
export function contextNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value === 'string' && value.trim() !== '') {
      return Number(value);
    }
    return value === '' ? undefined : value;
  }, schema);
}

export function contextBoolean<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }, schema);
}

export function contextString<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

export const cidrSchema = z.string().superRefine((cidr, ctx) => {
  const result = validateCidr(cidr);
  if (!result.valid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error ?? `Invalid CIDR: ${cidr}` });
  }
});

/**
 * Minimal view of a construct node's context lookup
 */
export interface ContextSource {
  tryGetContext(key: string): unknown;
}

/**
 * Collect the given keys from CDK context, layered over `defaults`.
 * Keys absent from context keep their default.
 */
export function readContext(
  source: ContextSource,
  keys: readonly string[],
  defaults: Record<string, unknown> = {},
): Record<string, unknown> {
  const raw: Record<string, unknown> = { ...defaults };
  for (const key of keys) {
    const value = source.tryGetContext(key);
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  return raw;
}
