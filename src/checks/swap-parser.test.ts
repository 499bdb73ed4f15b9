/**
 * Swap summary aggregation tests
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { CollectionError } from "../plugin/errors.js";
import { aggregateSwapOutput } from "./swap-parser.js";

const singleDevice = [
  "Device          1K-blocks     Used    Avail Capacity",
  "/dev/ada0p3       2097152    10240  2086912     0%",
  "",
].join("\n");

const twoDevices = [
  "Device          1K-blocks     Used    Avail Capacity",
  "/dev/ada0p3       2097152   524288  1572864    25%",
  "/dev/md0           100000    50000    50000    50%",
].join("\n");

test("aggregateSwapOutput: single device row", () => {
  assert.deepEqual(aggregateSwapOutput(singleDevice), {
    totalBlocks: 2097152,
    usedBlocks: 10240,
    availableBlocks: 2086912,
    usagePercent: 0,
  });
});

test("aggregateSwapOutput: sums columns across devices", () => {
  assert.deepEqual(aggregateSwapOutput(twoDevices), {
    totalBlocks: 2197152,
    usedBlocks: 574288,
    availableBlocks: 1622864,
    usagePercent: 75,
  });
});

test("aggregateSwapOutput: headers and blank lines contribute nothing", () => {
  const counters = aggregateSwapOutput("Device 1K-blocks Used Avail Capacity\n\n   \n");
  assert.deepEqual(counters, {
    totalBlocks: 0,
    usedBlocks: 0,
    availableBlocks: 0,
    usagePercent: 0,
  });
});

test("aggregateSwapOutput: accepts CRLF line endings", () => {
  const counters = aggregateSwapOutput("Device 1K-blocks Used Avail Capacity\r\n/dev/da1 400 100 300 25%\r\n");
  assert.deepEqual(counters, {
    totalBlocks: 400,
    usedBlocks: 100,
    availableBlocks: 300,
    usagePercent: 25,
  });
});

test("aggregateSwapOutput: a row with a trailing space after % is skipped", () => {
  const counters = aggregateSwapOutput("/dev/da1 400 100 300 25% ");
  assert.equal(counters.totalBlocks, 0);
});

test("aggregateSwapOutput: permissive mode counts a Total row too", () => {
  const withTotal = twoDevices + "\nTotal             2197152   574288  1622864    26%";
  assert.equal(aggregateSwapOutput(withTotal).totalBlocks, 2197152 * 2);
});

test("aggregateSwapOutput: strict mode skips the Total row", () => {
  const withTotal = twoDevices + "\nTotal             2197152   574288  1622864    26%";
  assert.deepEqual(aggregateSwapOutput(withTotal, { strict: true }), {
    totalBlocks: 2197152,
    usedBlocks: 574288,
    availableBlocks: 1622864,
    usagePercent: 75,
  });
});

test("aggregateSwapOutput: strict mode rejects a truncated row", () => {
  assert.throws(
    () => aggregateSwapOutput("Device 1K-blocks Used Avail Capacity\n300 25%", { strict: true }),
    (error: unknown) =>
      error instanceof CollectionError && error.message === "Malformed device row: '300 25%'",
  );
});

test("aggregateSwapOutput: permissive mode sums whatever the trailing columns say", () => {
  const counters = aggregateSwapOutput("garbage 1 2 3 4%\nmore 5 6 7 8%");
  assert.deepEqual(counters, {
    totalBlocks: 6,
    usedBlocks: 8,
    availableBlocks: 10,
    usagePercent: 12,
  });
});
