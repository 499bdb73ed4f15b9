/**
 * Status line rendering
 */

import type { CheckResult } from "../core/types.js";
import { statusName } from "../core/types.js";

/**
 * Renders the single line a monitoring supervisor reads from stdout,
 * e.g. `SWAP OK - 42% swap_usage | swap_usage=42%;80;90`
 */
export function formatStatusLine(shortName: string, result: CheckResult): string {
  const head = `${shortName} ${statusName(result.status)} - ${result.message}`;
  return result.perfData ? `${head} | ${result.perfData}` : head;
}
