import {
  GetCostAndUsageCommand,
  type CostExplorerClient,
  type DateInterval,
  type ResultByTime,
} from '@aws-sdk/client-cost-explorer';

export const COST_METRIC = 'UnblendedCost';

export interface ServiceCost {
  readonly service: string;
  readonly cost: number;
}

export interface BillingData {
  readonly totalCost: number;
  readonly currency: string;
  /** Sorted by cost, highest first */
  readonly serviceCosts: ServiceCost[];
  /** "<start> to <end>" */
  readonly period: string;
}

export interface BillingPeriod {
  readonly start: string;
  /** Exclusive, as Cost Explorer expects */
  readonly end: string;
}

export interface GetBillingDataOptions {
  readonly now?: Date;
  /** @default 0.01 */
  readonly minServiceCost?: number;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Month-to-date period in UTC.
 *
 * Cost Explorer rejects an empty range, so on the first day of a month the
 * whole previous month is reported instead.
 */
export function billingPeriod(now: Date): BillingPeriod {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  const end = formatDate(now);
  const start = formatDate(new Date(Date.UTC(year, month, 1)));
  if (start !== end) {
    return { start, end };
  }
  return { start: formatDate(new Date(Date.UTC(year, month - 1, 1))), end };
}

function parseAmount(amount: string | undefined): number {
  const value = Number.parseFloat(amount ?? '0');
  return Number.isFinite(value) ? value : 0;
}

function firstResult(results: ResultByTime[] | undefined): ResultByTime | undefined {
  return results?.[0];
}

async function getServiceCosts(
  client: CostExplorerClient,
  timePeriod: DateInterval,
  minServiceCost: number,
): Promise<ServiceCost[]> {
  const serviceCosts: ServiceCost[] = [];
  let nextPageToken: string | undefined;

  do {
    const response = await client.send(
      new GetCostAndUsageCommand({
        TimePeriod: timePeriod,
        Granularity: 'MONTHLY',
        Metrics: [COST_METRIC],
        GroupBy: [{ Type: 'DIMENSION', Key: 'SERVICE' }],
        NextPageToken: nextPageToken,
      }),
    );

    for (const group of firstResult(response.ResultsByTime)?.Groups ?? []) {
      const service = group.Keys?.[0];
      const cost = parseAmount(group.Metrics?.[COST_METRIC]?.Amount);
      if (service !== undefined && cost > minServiceCost) {
        serviceCosts.push({ service, cost });
      }
    }
    nextPageToken = response.NextPageToken;
  } while (nextPageToken);

  return serviceCosts.sort((a, b) => b.cost - a.cost);
}

/**
 * Month-to-date total and per-service unblended cost
 */
export async function getBillingData(
  client: CostExplorerClient,
  options: GetBillingDataOptions = {},
): Promise<BillingData> {
  const { start, end } = billingPeriod(options.now ?? new Date());
  const timePeriod: DateInterval = { Start: start, End: end };

  const totalResponse = await client.send(
    new GetCostAndUsageCommand({
      TimePeriod: timePeriod,
      Granularity: 'MONTHLY',
      Metrics: [COST_METRIC],
    }),
  );
  const total = firstResult(totalResponse.ResultsByTime)?.Total?.[COST_METRIC];

  return {
    totalCost: parseAmount(total?.Amount),
    currency: total?.Unit ?? 'USD',
    serviceCosts: await getServiceCosts(client, timePeriod, options.minServiceCost ?? 0.01),
    period: `${start} to ${end}`,
  };
}
