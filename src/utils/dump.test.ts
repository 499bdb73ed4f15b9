/**
 * YAML dump tests
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { yamlDump } from "./dump.js";

test("yamlDump: nested objects use block style", () => {
  assert.equal(
    yamlDump({ counters: { totalBlocks: 400, usedBlocks: 100 } }),
    "counters:\n  totalBlocks: 400\n  usedBlocks: 100\n",
  );
});

test("yamlDump: simple arrays use flow style", () => {
  assert.equal(yamlDump({ sizes: [1, 2] }), "sizes: [ 1, 2 ]\n");
});

test("yamlDump: arrays of objects stay in block style", () => {
  assert.equal(yamlDump({ rows: [{ n: 1 }] }), "rows:\n  - n: 1\n");
});
