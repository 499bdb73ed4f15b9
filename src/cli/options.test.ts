/**
 * Command line parsing tests
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import type { PluginConfig } from "../config/types.js";
import { ConfigurationError } from "../plugin/errors.js";
import type { CommandLine } from "./options.js";
import { parseCommandLine } from "./options.js";

const plugin: PluginConfig = {
  name: "check_swap",
  shortName: "SWAP",
  version: "1.0.0",
  defaultTimeoutSeconds: 15,
  extraOptsFiles: [],
};

function check(argv: string[]) {
  const parsed: CommandLine = parseCommandLine(argv, plugin);
  assert.equal(parsed.kind, "check");
  if (parsed.kind !== "check") throw new Error("unreachable");
  return parsed.config;
}

function rejects(argv: string[], message: string) {
  assert.throws(
    () => parseCommandLine(argv, plugin),
    (error: unknown) => error instanceof ConfigurationError && error.message === message,
  );
}

const validMeasurements =
  "Valid measurements: total_swap_blocks, used_swap_blocks, available_swap_blocks, swap_usage";

test("parseCommandLine: short options", () => {
  const config = check(["-m", "swap_usage", "-w", "80", "-c", "90", "-t", "5"]);
  assert.equal(config.measurement, "swap_usage");
  assert.equal(config.thresholds.warning?.toString(), "80");
  assert.equal(config.thresholds.critical?.toString(), "90");
  assert.equal(config.timeoutMs, 5000);
  assert.equal(config.verbosity, 0);
  assert.equal(config.strictRows, false);
});

test("parseCommandLine: long options with = and defaults", () => {
  const config = check(["--measurement=used_swap_blocks", "--warning=@10:20", "--strict-rows"]);
  assert.equal(config.measurement, "used_swap_blocks");
  assert.equal(config.thresholds.warning?.alertOn, "inside");
  assert.equal(config.thresholds.critical, undefined);
  assert.equal(config.timeoutMs, 15_000);
  assert.equal(config.strictRows, true);
});

test("parseCommandLine: -v is repeatable and capped at 3", () => {
  assert.equal(check(["-m", "swap_usage", "-v"]).verbosity, 1);
  assert.equal(check(["-m", "swap_usage", "-vv"]).verbosity, 2);
  assert.equal(check(["-m", "swap_usage", "-v", "-v", "-v", "-v"]).verbosity, 3);
  assert.equal(check(["-m", "swap_usage", "--verbose", "--verbose"]).verbosity, 2);
});

test("parseCommandLine: later values win", () => {
  const config = check(["--warning=80", "-m", "swap_usage", "-w", "70"]);
  assert.equal(config.thresholds.warning?.toString(), "70");
});

test("parseCommandLine: missing measurement lists valid names", () => {
  rejects(["-w", "80"], `Missing required option --measurement. ${validMeasurements}`);
});

test("parseCommandLine: unknown measurement lists valid names", () => {
  rejects(["-m", "bogus_metric"], `Invalid measurement 'bogus_metric'. ${validMeasurements}`);
});

test("parseCommandLine: malformed thresholds are rejected", () => {
  rejects(["-m", "swap_usage", "-w", "abc"], "--warning: Invalid range definition 'abc'");
  rejects(
    ["-m", "swap_usage", "-c", "20:10"],
    "--critical: Invalid range definition '20:10': start is greater than end",
  );
});

test("parseCommandLine: invalid timeouts are rejected", () => {
  rejects(["-m", "swap_usage", "-t", "soon"], "--timeout must be a number of seconds");
  rejects(["-m", "swap_usage", "-t", "0"], "--timeout must be greater than 0");
  rejects(["-m", "swap_usage", "-t", "1.5"], "--timeout must be a whole number of seconds");
});

test("parseCommandLine: timeouts beyond the timer range are rejected", () => {
  rejects(["-m", "swap_usage", "-t", "3000000"], "--timeout must be at most 2147483 seconds");
  assert.equal(check(["-m", "swap_usage", "-t", "2147483"]).timeoutMs, 2_147_483_000);
});

test("parseCommandLine: unknown options are configuration errors", () => {
  rejects(["-m", "swap_usage", "--xyzzy"], "unknown option '--xyzzy'");
});

test("parseCommandLine: --help returns the usage text", () => {
  const parsed = parseCommandLine(["--help"], plugin);
  assert.equal(parsed.kind, "info");
  if (parsed.kind !== "info") return;
  assert.ok(parsed.text.startsWith("Usage: check_swap [options]"));
  assert.ok(parsed.text.includes("-m, --measurement <name>"));
  assert.ok(parsed.text.includes("@10:20  alert if value is inside 10..20"));
});

test("parseCommandLine: --version returns the version", () => {
  assert.deepEqual(parseCommandLine(["--version"], plugin), { kind: "info", text: "1.0.0" });
});
