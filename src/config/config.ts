/**
 * Configuration and environment variable validation
 */

import type { Config } from "./types.js";
import { env, envOneOf, parseArgList, parsePathList } from "./utils.js";

export type { Config };

/**
 * Standard locations searched for `--extra-opts` ini files, in order
 */
export const defaultExtraOptsFiles = [
  "/etc/nagios/plugins.ini",
  "/usr/local/nagios/etc/plugins.ini",
  "/usr/local/etc/nagios/plugins.ini",
  "/etc/opt/nagios/plugins.ini",
  "/etc/nagios-plugins.ini",
  "/usr/local/etc/nagios-plugins.ini",
  "/etc/opt/nagios-plugins.ini",
] as const;

/**
 * Creates default configuration instance using environment variables
 * @returns Default configuration with environment overrides
 */
export function createDefaultConfig(): Config {
  return {
    // Swap summary utility
    swap: {
      // Absolute path of the utility
      path: env("SWAP_CHECK_COMMAND", "/usr/sbin/swapinfo"),
      // Arguments requesting the per-device summary in 1K blocks
      args: parseArgList(env("SWAP_CHECK_COMMAND_ARGS", "-k")),
    },
    plugin: {
      // Section name looked up in --extra-opts ini files
      name: "check_swap",
      // Prefix of the status line
      shortName: env("SWAP_CHECK_SHORTNAME", "SWAP"),
      version: "1.0.0",
      // Used when -t is not given
      defaultTimeoutSeconds: env("SWAP_CHECK_DEFAULT_TIMEOUT", 15),
      // Overrides the standard ini search path
      extraOptsFiles: parsePathList(
        env("SWAP_CHECK_EXTRA_OPTS_PATH", defaultExtraOptsFiles.join(":")),
      ),
    },
    logging: {
      // Log format: "pretty" for terminals, "json" for log shippers
      format: envOneOf("LOGGING_FORMAT", ["pretty", "json"], "pretty"),
    },
  };
}
