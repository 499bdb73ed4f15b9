/**
 * Swap blocks in use across all devices
 */

import type { MetricSpec } from "../types.js";

export const usedSwapBlocks: MetricSpec<"used_swap_blocks"> = {
  name: "used_swap_blocks",
  unit: "kB",
  select: (counters) => counters.usedBlocks,
};
