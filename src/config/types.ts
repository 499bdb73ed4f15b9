/**
 * Configuration type definitions
 */

import { z } from "zod";

/**
 * Domain-specific configuration sections
 */
export interface SwapCommandConfig {
  readonly path: string;
  readonly args: readonly string[];
}

export interface PluginConfig {
  readonly name: string;
  readonly shortName: string;
  readonly version: string;
  readonly defaultTimeoutSeconds: number;
  readonly extraOptsFiles: readonly string[];
}

export interface LoggingConfig {
  readonly format: "pretty" | "json";
}

/**
 * Parsed and validated configuration object
 */
export interface Config {
  readonly swap: SwapCommandConfig;
  readonly plugin: PluginConfig;
  readonly logging: LoggingConfig;
}

/**
 * Zod schema for configuration validation
 * Validates the entire configuration object structure
 */
export const configSchema = z.object({
  swap: z.object({
    path: z.string().min(1),
    args: z.array(z.string()),
  }),
  plugin: z.object({
    name: z.string().min(1),
    shortName: z.string().min(1),
    version: z.string(),
    defaultTimeoutSeconds: z.number().int().positive(),
    extraOptsFiles: z.array(z.string().min(1)),
  }),
  logging: z.object({
    format: z.enum(["pretty", "json"]),
  }),
});
