/**
 * Error taxonomy for the check pipeline
 *
 * Every failure resolves to a single UNKNOWN status line: the check itself
 * could not run, which is different from a judged WARNING or CRITICAL.
 */

import type { CheckResult } from "../core/types.js";
import { ExitStatus } from "../core/types.js";

export abstract class PluginError extends Error {
  abstract readonly kind: string;
  readonly status: ExitStatus = ExitStatus.UNKNOWN;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing options, malformed thresholds */
export class ConfigurationError extends PluginError {
  readonly kind = "configuration";
}

/** The swap utility is missing, not a file or not executable */
export class EnvironmentError extends PluginError {
  readonly kind = "environment";
}

/** The swap utility ran but its output cannot be used */
export class CollectionError extends PluginError {
  readonly kind = "collection";
}

export class CheckTimeoutError extends PluginError {
  readonly kind = "timeout";

  constructor(readonly timeoutMs: number) {
    super(`Check timed out after ${formatSeconds(timeoutMs)}s`);
  }
}

function formatSeconds(ms: number): string {
  return String(Math.round(ms / 10) / 100);
}

/**
 * Converts anything thrown by the pipeline into an UNKNOWN result
 */
export function toCheckResult(error: unknown): CheckResult {
  if (error instanceof PluginError) {
    return { status: error.status, message: singleLine(error.message), perfData: "" };
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    status: ExitStatus.UNKNOWN,
    message: `Unexpected error: ${singleLine(message)}`,
    perfData: "",
  };
}

// The status line is the only stdout line a supervisor reads
function singleLine(message: string): string {
  return message.replace(/\s*[\r\n]+\s*/g, " ").trim();
}
