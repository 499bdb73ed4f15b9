/**
 * Monitoring threshold ranges
 *
 * Syntax: `[@][start:][end]`, where start may be `~` for negative infinity.
 *
 * | range   | alerts when value is  |
 * |---------|-----------------------|
 * | `10`    | < 0 or > 10           |
 * | `10:`   | < 10                  |
 * | `~:10`  | > 10                  |
 * | `10:20` | < 10 or > 20          |
 * | `@10:20`| >= 10 and <= 20       |
 */

import { ConfigurationError } from "../plugin/errors.js";

const NUMBER = "[-+]?(?:\\d+(?:\\.\\d*)?|\\.\\d+)(?:[eE][-+]?\\d+)?";
const RANGE_PATTERN = new RegExp(`^(@)?(?:(~|${NUMBER})?:)?(${NUMBER})?$`);

export type AlertOn = "outside" | "inside";

export class ThresholdRange {
  constructor(
    readonly start: number,
    readonly end: number,
    readonly alertOn: AlertOn = "outside",
  ) {}

  /**
   * True when the value should raise an alert for this range
   */
  isViolated(value: number): boolean {
    const within = this.start <= value && value <= this.end;
    return this.alertOn === "inside" ? within : !within;
  }

  /**
   * Canonical form used in performance data
   */
  toString(): string {
    let out = this.alertOn === "inside" ? "@" : "";
    if (this.start === -Infinity) {
      out += "~:";
    } else if (this.start !== 0) {
      out += `${this.start}:`;
    }
    if (this.end !== Infinity) {
      out += String(this.end);
    }
    return out;
  }
}

export function parseRange(text: string): ThresholdRange {
  const compact = text.replace(/\s+/g, "");
  const match = RANGE_PATTERN.exec(compact);
  // Needs at least one bound or a "~"; a bare ":" or "@" is not a range
  if (!match || !/[\d~]/.test(compact)) {
    throw new ConfigurationError(`Invalid range definition '${text}'`);
  }

  const [, at, startText, endText] = match;
  const hasColon = compact.includes(":");
  const start = startText === "~" ? -Infinity : startText ? Number(startText) : 0;
  const end = endText !== undefined ? Number(endText) : hasColon ? Infinity : 0;

  if (start > end) {
    throw new ConfigurationError(
      `Invalid range definition '${text}': start is greater than end`,
    );
  }

  return new ThresholdRange(start, end, at ? "inside" : "outside");
}
