/**
 * Swap metric specs
 */

import type { MetricName, MetricSpec, MetricValue, SwapCounters } from "../types.js";
import { metricNames } from "../types.js";
import { totalSwapBlocks } from "./total-swap-blocks.js";
import { usedSwapBlocks } from "./used-swap-blocks.js";
import { availableSwapBlocks } from "./available-swap-blocks.js";
import { swapUsage } from "./swap-usage.js";

export const metricSpecs: { readonly [N in MetricName]: MetricSpec<N> } = {
  total_swap_blocks: totalSwapBlocks,
  used_swap_blocks: usedSwapBlocks,
  available_swap_blocks: availableSwapBlocks,
  swap_usage: swapUsage,
};

export function isMetricName(value: string): value is MetricName {
  return (metricNames as readonly string[]).includes(value);
}

/**
 * Picks the requested metric out of the aggregated counters
 */
export function selectMetric(name: MetricName, counters: SwapCounters): MetricValue {
  const spec: MetricSpec = metricSpecs[name];
  return {
    name,
    value: spec.select(counters),
    unit: spec.unit,
  };
}
