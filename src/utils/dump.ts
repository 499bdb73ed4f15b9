/**
 * @fileoverview YAML serialization for trace-level diagnostic dumps
 */

import { stringify, YAMLSeq } from "yaml";

/**
 * Recursively converts simple arrays to flow style for more compact YAML output
 *
 * Simple arrays (containing only primitives) become `[a, b, c]`; complex
 * arrays and objects are processed recursively to keep their structure.
 */
function convertSimpleArraysToFlowStyle(value: unknown): unknown {
  if (Array.isArray(value)) {
    const isSimpleArray = value.every(
      (item) =>
        typeof item === "string" ||
        typeof item === "number" ||
        typeof item === "boolean" ||
        item === null,
    );

    if (isSimpleArray) {
      const seq = new YAMLSeq();
      seq.flow = true;
      value.forEach((item) => seq.add(item));
      return seq;
    }
    return value.map(convertSimpleArraysToFlowStyle);
  } else if (value && typeof value === "object" && !(value instanceof YAMLSeq)) {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = convertSimpleArraysToFlowStyle(val);
    }
    return result;
  }

  return value;
}

/**
 * Serializes a value to YAML
 *
 * @throws {Error} "Tag not resolved for Function value" when the value
 *   contains functions or symbols
 */
export function yamlDump(value: unknown): string {
  const processedValue = convertSimpleArraysToFlowStyle(value);

  return stringify(processedValue, {
    indent: 2,
    // Do not fold long lines automatically to avoid unexpected newlines
    lineWidth: 0,
    minContentWidth: 20,
    defaultStringType: "PLAIN",
  });
}
