/**
 * Swap capacity percentage
 */

import type { MetricSpec } from "../types.js";

// Summed over device rows, so several devices can report more than 100
export const swapUsage: MetricSpec<"swap_usage"> = {
  name: "swap_usage",
  unit: "%",
  select: (counters) => counters.usagePercent,
};
