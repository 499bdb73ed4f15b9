/**
 * Threshold evaluation tests
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import type { MetricValue } from "../checks/types.js";
import { ExitStatus } from "../core/types.js";
import { checkThresholds, evaluateMetric } from "./evaluator.js";
import { parseRange } from "./range.js";

const thresholds = { warning: parseRange("80"), critical: parseRange("90") };

function usage(value: number): MetricValue {
  return { name: "swap_usage", value, unit: "%" };
}

test("checkThresholds: between warning and critical is WARNING", () => {
  assert.equal(checkThresholds(85, thresholds), ExitStatus.WARNING);
});

test("checkThresholds: above critical is CRITICAL", () => {
  assert.equal(checkThresholds(95, thresholds), ExitStatus.CRITICAL);
});

test("checkThresholds: below both is OK", () => {
  assert.equal(checkThresholds(10, thresholds), ExitStatus.OK);
});

test("checkThresholds: critical wins when both ranges are breached", () => {
  const both = { warning: parseRange("@0:100"), critical: parseRange("@0:100") };
  assert.equal(checkThresholds(50, both), ExitStatus.CRITICAL);
});

test("evaluateMetric: OK stands when thresholds are supplied", () => {
  assert.deepEqual(evaluateMetric(usage(10), thresholds), {
    status: ExitStatus.OK,
    message: "10% swap_usage",
    perfData: "swap_usage=10%;80;90",
  });
});

test("evaluateMetric: WARNING and CRITICAL carry message and perfdata", () => {
  assert.deepEqual(evaluateMetric(usage(85), thresholds), {
    status: ExitStatus.WARNING,
    message: "85% swap_usage",
    perfData: "swap_usage=85%;80;90",
  });
  assert.equal(evaluateMetric(usage(95), thresholds).status, ExitStatus.CRITICAL);
});

test("evaluateMetric: without thresholds a fine value is UNKNOWN, not OK", () => {
  assert.deepEqual(evaluateMetric(usage(5), {}), {
    status: ExitStatus.UNKNOWN,
    message: "5% swap_usage",
    perfData: "swap_usage=5%;;",
  });
});

test("evaluateMetric: a single threshold is enough to keep OK", () => {
  const result = evaluateMetric(usage(5), { critical: parseRange("90") });
  assert.equal(result.status, ExitStatus.OK);
  assert.equal(result.perfData, "swap_usage=5%;;90");
});

test("evaluateMetric: block metrics use kB", () => {
  const result = evaluateMetric(
    { name: "available_swap_blocks", value: 2048, unit: "kB" },
    { warning: parseRange("1024:") },
  );
  assert.deepEqual(result, {
    status: ExitStatus.OK,
    message: "2048kB available_swap_blocks",
    perfData: "available_swap_blocks=2048kB;1024:;",
  });
});
