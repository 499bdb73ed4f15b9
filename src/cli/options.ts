/**
 * Command line options of the swap check
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";
import type { CheckConfig } from "../check.js";
import { isMetricName } from "../checks/metrics/index.js";
import { metricNames } from "../checks/types.js";
import type { PluginConfig } from "../config/types.js";
import { ConfigurationError } from "../plugin/errors.js";
import { parseRange } from "../thresholds/range.js";

export const MAX_VERBOSITY = 3;
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export type CommandLine =
  | { readonly kind: "check"; readonly config: CheckConfig }
  | { readonly kind: "info"; readonly text: string };

const validMeasurements = `Valid measurements: ${metricNames.join(", ")}`;

function rangeOption(flag: string) {
  return z.string().optional().transform((text, ctx) => {
    if (text === undefined) return undefined;
    try {
      return parseRange(text);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${flag}: ${error instanceof Error ? error.message : String(error)}`,
      });
      return z.NEVER;
    }
  });
}

/**
 * Zod schema for the raw option values commander produces
 */
export const optionsSchema = z.object({
  measurement: z
    .string({ required_error: `Missing required option --measurement. ${validMeasurements}` })
    .refine(isMetricName, (value) => ({
      message: `Invalid measurement '${value}'. ${validMeasurements}`,
    })),
  warning: rangeOption("--warning"),
  critical: rangeOption("--critical"),
  timeout: z.coerce
    .number({ invalid_type_error: "--timeout must be a number of seconds" })
    .int("--timeout must be a whole number of seconds")
    .positive("--timeout must be greater than 0")
    // setTimeout cannot wait longer than 2^31-1 ms
    .max(MAX_TIMEOUT_SECONDS, `--timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds`),
  verbose: z.number().int().nonnegative().transform((count) => Math.min(count, MAX_VERBOSITY)),
  strictRows: z.boolean().default(false),
});

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Builds the commander program; output is routed to the given sinks
 */
export function createProgram(
  plugin: PluginConfig,
  output: { writeOut(text: string): void; writeErr(text: string): void },
): Command {
  return new Command(plugin.name)
    .description("Checks swap space reported by the swap summary utility")
    .option("-w, --warning <range>", "warning threshold range")
    .option("-c, --critical <range>", "critical threshold range")
    .option("-m, --measurement <name>", `one of: ${metricNames.join(", ")}`)
    .option(
      "-t, --timeout <seconds>",
      "seconds before the check gives up",
      String(plugin.defaultTimeoutSeconds),
    )
    .option("-v, --verbose", "more diagnostics on stderr (repeatable, up to 3)", increaseVerbosity, 0)
    .option("--strict-rows", "reject malformed device rows and skip the Total row")
    .version(plugin.version, "-V, --version")
    .addHelpText(
      "after",
      `
  --extra-opts[=[section][@file]]
                            read options from an ini file section
                            (default section: ${plugin.name})

Threshold ranges:
  10      alert if value > 10 (or < 0)
  10:     alert if value < 10
  ~:10    alert if value > 10
  10:20   alert if value is outside 10..20
  @10:20  alert if value is inside 10..20`,
    )
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput(output);
}

/**
 * Parses argv into a check configuration, or the help/version text
 * @throws {ConfigurationError} on any invalid or missing option
 */
export function parseCommandLine(argv: readonly string[], plugin: PluginConfig): CommandLine {
  const out: string[] = [];
  const program = createProgram(plugin, {
    writeOut: (text) => out.push(text),
    // Commander errors are reported through the thrown CommanderError
    writeErr: () => undefined,
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === "commander.helpDisplayed" || error.code === "commander.version") {
        return { kind: "info", text: out.join("").trimEnd() };
      }
      throw new ConfigurationError(error.message.replace(/^error: /, ""), { cause: error });
    }
    throw error;
  }

  const parsed = optionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues[0].message, { cause: parsed.error });
  }

  const options = parsed.data;
  return {
    kind: "check",
    config: {
      measurement: options.measurement,
      thresholds: { warning: options.warning, critical: options.critical },
      timeoutMs: options.timeout * 1000,
      verbosity: options.verbose,
      strictRows: options.strictRows,
    },
  };
}
