/**
 * Threshold evaluation of a selected metric
 */

import type { MetricValue } from "../checks/types.js";
import type { CheckResult } from "../core/types.js";
import { ExitStatus } from "../core/types.js";
import { formatPerfData } from "../plugin/perfdata.js";
import type { ThresholdRange } from "./range.js";

export interface Thresholds {
  readonly warning?: ThresholdRange;
  readonly critical?: ThresholdRange;
}

/**
 * Critical is checked before warning; a value breaching neither is OK
 */
export function checkThresholds(value: number, thresholds: Thresholds): ExitStatus {
  if (thresholds.critical?.isViolated(value)) {
    return ExitStatus.CRITICAL;
  }
  if (thresholds.warning?.isViolated(value)) {
    return ExitStatus.WARNING;
  }
  return ExitStatus.OK;
}

export function hasThresholds(thresholds: Thresholds): boolean {
  return thresholds.warning !== undefined || thresholds.critical !== undefined;
}

/**
 * Judges a metric against the thresholds and renders message and perfdata.
 * Without any threshold an OK value has nothing to be judged against and
 * is reported as UNKNOWN.
 */
export function evaluateMetric(metric: MetricValue, thresholds: Thresholds): CheckResult {
  let status = checkThresholds(metric.value, thresholds);
  if (status === ExitStatus.OK && !hasThresholds(thresholds)) {
    status = ExitStatus.UNKNOWN;
  }

  return {
    status,
    message: `${metric.value}${metric.unit} ${metric.name}`,
    perfData: formatPerfData({
      label: metric.name,
      value: metric.value,
      unit: metric.unit,
      warning: thresholds.warning?.toString(),
      critical: thresholds.critical?.toString(),
    }),
  };
}
