/**
 * Structured logging infrastructure with pretty and JSON format support
 *
 * Stdout belongs to the status line, so all diagnostics go to stderr and
 * are gated by the plugin's -v count.
 */

export type LogFormat = "pretty" | "json";
export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

// Global logger configuration - initialized once at startup
const loggerConfig: { format: LogFormat; verbosity: number } = {
  format: "pretty",
  verbosity: 0,
};

// Minimum -v count at which each level is printed
const levelVerbosity: Record<LogLevel, number> = {
  error: 1,
  warn: 1,
  info: 1,
  debug: 2,
  trace: 3,
};

/**
 * Initializes logger with configuration
 * Must be called before any logging functions
 */
export function initializeLogger(format: LogFormat, verbosity = 0): void {
  loggerConfig.format = format;
  loggerConfig.verbosity = verbosity;
}

/**
 * Detects if terminal supports colors
 * Returns false in CI environments or when stderr is not a TTY
 */
function supportsColor(): boolean {
  if (process.env.CI === "true" || process.env.CONTINUOUS_INTEGRATION === "true") {
    return false;
  }
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  return process.stderr.isTTY === true;
}

/**
 * Formats a log entry as pretty human-readable text with optional colors
 */
function formatPretty(fields: Record<string, unknown>): string {
  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm format
  const mod = typeof fields.mod === "string" ? fields.mod : "unknown";
  const event = typeof fields.event === "string" ? fields.event : "unknown";

  // Remove mod and event from fields for display
  const { mod: _, event: __, ts: ___, level: ____, ...rest } = fields;

  const supportsColors = supportsColor();
  const modColor = supportsColors ? "\x1b[1;36m" : ""; // Cyan for module
  const eventColor = supportsColors ? "\x1b[1;32m" : ""; // Green for event
  const resetColor = supportsColors ? "\x1b[0m" : "";

  const parts: string[] = [
    `[${timestamp}]`,
    `${modColor}${mod.toUpperCase()}${resetColor}`,
    `${eventColor}${event}${resetColor}`,
  ];

  // Add key-value pairs for remaining fields
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined && value !== null) {
      const displayValue = typeof value === "string" ? `"${value}"` : String(value);
      parts.push(`${key}=${displayValue}`);
    }
  }

  return parts.join(" ");
}

/**
 * Formats a log entry as JSON string
 */
function formatJson(fields: Record<string, unknown>): string {
  const base = { ts: new Date().toISOString() };
  return JSON.stringify({ ...base, ...fields });
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in levelVerbosity;
}

/**
 * Logs a structured message to stderr in configured format.
 * Entries without a level are treated as "info".
 */
export function log(fields: Record<string, unknown>): void {
  const level = isLogLevel(fields.level) ? fields.level : "info";
  if (loggerConfig.verbosity < levelVerbosity[level]) {
    return;
  }

  if (loggerConfig.format === "json") {
    console.error(formatJson({ ...fields, level }));
  } else {
    console.error(formatPretty(fields));
  }
}
