/**
 * Free swap blocks across all devices
 */

import type { MetricSpec } from "../types.js";

export const availableSwapBlocks: MetricSpec<"available_swap_blocks"> = {
  name: "available_swap_blocks",
  unit: "kB",
  select: (counters) => counters.availableBlocks,
};
