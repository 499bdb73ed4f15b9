/**
 * Total swap size across all devices
 */

import type { MetricSpec } from "../types.js";

export const totalSwapBlocks: MetricSpec<"total_swap_blocks"> = {
  name: "total_swap_blocks",
  unit: "kB",
  select: (counters) => counters.totalBlocks,
};
