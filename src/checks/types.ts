/**
 * Types for the checks system
 */

export const metricNames = [
  "total_swap_blocks",
  "used_swap_blocks",
  "available_swap_blocks",
  "swap_usage",
] as const;

export type MetricName = typeof metricNames[number];

/**
 * Column-wise sums over every device row of the swap summary
 */
export interface SwapCounters {
  readonly totalBlocks: number;
  readonly usedBlocks: number;
  readonly availableBlocks: number;
  readonly usagePercent: number;
}

export const emptyCounters: SwapCounters = {
  totalBlocks: 0,
  usedBlocks: 0,
  availableBlocks: 0,
  usagePercent: 0,
};

export interface MetricSpec<N extends MetricName = MetricName> {
  readonly name: N;
  readonly unit: string;
  select(counters: SwapCounters): number;
}

export interface MetricValue {
  readonly name: MetricName;
  readonly value: number;
  readonly unit: string;
}
