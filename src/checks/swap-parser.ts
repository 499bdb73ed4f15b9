/**
 * Aggregates swap summary output into counters
 *
 * Device rows look like
 *   Device          1K-blocks     Used    Avail Capacity
 *   /dev/ada0p3       2097152    10240  2086912     0%
 * and every row ending in four numeric columns plus `%` is summed.
 */

import { CollectionError } from "../plugin/errors.js";
import type { SwapCounters } from "./types.js";
import { emptyCounters } from "./types.js";

const DEVICE_ROW = /(\d*)\s+(\d*)\s+(\d*)\s+(\d*)%$/;
const STRICT_ROW = /^(\S+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+)%$/;
const PERCENT_SUFFIX = /\d%$/;

export interface AggregateOptions {
  /**
   * Require the exact five-column layout for every row ending in `N%`
   * and skip the utility's own `Total` row
   */
  readonly strict?: boolean;
}

function toCount(text: string | undefined): number {
  return text ? Number.parseInt(text, 10) : 0;
}

function add(counters: SwapCounters, columns: readonly (string | undefined)[]): SwapCounters {
  const [blocks, used, avail, capacity] = columns;
  return {
    totalBlocks: counters.totalBlocks + toCount(blocks),
    usedBlocks: counters.usedBlocks + toCount(used),
    availableBlocks: counters.availableBlocks + toCount(avail),
    usagePercent: counters.usagePercent + toCount(capacity),
  };
}

export function aggregateSwapOutput(raw: string, options: AggregateOptions = {}): SwapCounters {
  let counters = emptyCounters;

  for (const line of raw.split(/\r?\n/)) {
    if (options.strict) {
      if (!PERCENT_SUFFIX.test(line)) continue;
      const row = STRICT_ROW.exec(line.trim());
      if (!row) {
        throw new CollectionError(`Malformed device row: '${line.trim()}'`);
      }
      if (row[1] === "Total") continue;
      counters = add(counters, row.slice(2));
      continue;
    }

    const row = DEVICE_ROW.exec(line);
    // The pattern can match with every column empty, which is not a row
    if (!row || !/\d/.test(row[0])) continue;
    counters = add(counters, row.slice(1));
  }

  return counters;
}
