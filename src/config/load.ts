import type { Config } from "./types.js";
import { configSchema } from "./types.js";
import { createDefaultConfig } from "./config.js";
import { ConfigurationError } from "../plugin/errors.js";

/**
 * Cached configuration instance
 * Exported for testing purposes to allow cache clearing
 */
export let cachedConfig: Config | null = null;

/**
 * Clears the configuration cache
 * Used for testing purposes
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Loads and validates environment configuration
 * Uses caching to avoid repeated parsing of environment variables
 * @throws {ConfigurationError} if a value fails the schema
 * @throws {Error} if a variable cannot be converted
 */
export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const config = createDefaultConfig();

  // Validate the entire configuration object using zod schema
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid configuration: ${issue.path.join(".")}: ${issue.message}`,
      { cause: parsed.error },
    );
  }

  cachedConfig = parsed.data;
  return parsed.data;
}
