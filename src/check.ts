/**
 * Swap check pipeline: collect, aggregate, select, evaluate
 */

import { selectMetric } from "./checks/metrics/index.js";
import type { SwapCollector } from "./checks/swap-collector.js";
import { aggregateSwapOutput } from "./checks/swap-parser.js";
import type { MetricName } from "./checks/types.js";
import type { CheckResult } from "./core/types.js";
import { CheckTimeoutError, toCheckResult } from "./plugin/errors.js";
import type { Thresholds } from "./thresholds/evaluator.js";
import { evaluateMetric } from "./thresholds/evaluator.js";
import { yamlDump } from "./utils/dump.js";
import { log } from "./utils/logger.js";

/**
 * Everything one run needs, built once from the command line
 */
export interface CheckConfig {
  readonly measurement: MetricName;
  readonly thresholds: Thresholds;
  readonly timeoutMs: number;
  readonly verbosity: number;
  readonly strictRows: boolean;
}

export interface CheckDeps {
  readonly collector: SwapCollector;
}

async function collectAndEvaluate(
  config: CheckConfig,
  deps: CheckDeps,
  signal: AbortSignal,
): Promise<CheckResult> {
  const raw = await deps.collector.collect(signal);
  const counters = aggregateSwapOutput(raw, { strict: config.strictRows });
  log({ mod: "check", event: "counters", level: "debug", ...counters });
  log({ mod: "check", event: "counters_dump", level: "trace", dump: "\n" + yamlDump(counters) });

  const metric = selectMetric(config.measurement, counters);
  const result = evaluateMetric(metric, config.thresholds);
  log({ mod: "check", event: "evaluated", status: result.status, message: result.message });
  return result;
}

/**
 * Runs the pipeline under a deadline. On expiry the signal aborts the
 * collector (killing the utility) and the run resolves to UNKNOWN,
 * whatever stage it was in. Never rejects.
 */
export async function runCheck(config: CheckConfig, deps: CheckDeps): Promise<CheckResult> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CheckTimeoutError(config.timeoutMs);
      log({ mod: "check", event: "timeout", level: "warn", timeoutMs: config.timeoutMs });
      controller.abort(error);
      reject(error);
    }, config.timeoutMs);
  });

  try {
    return await Promise.race([
      collectAndEvaluate(config, deps, controller.signal),
      deadline,
    ]);
  } catch (error) {
    // A pipeline failure caused by the abort is reported as the timeout
    return toCheckResult(controller.signal.aborted ? controller.signal.reason : error);
  } finally {
    clearTimeout(timer);
  }
}
