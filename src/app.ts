/**
 * Plugin entry point
 * Wires configuration, command line, collector and check into one run
 */

import { runCheck } from "./check.js";
import type { SwapCollector } from "./checks/swap-collector.js";
import { SwapinfoCollector } from "./checks/swap-collector.js";
import { expandExtraOpts } from "./cli/extra-opts.js";
import { parseCommandLine } from "./cli/options.js";
import type { Config } from "./config/types.js";
import { loadConfig } from "./config/load.js";
import type { CheckResult } from "./core/types.js";
import { ExitStatus } from "./core/types.js";
import { toCheckResult } from "./plugin/errors.js";
import { formatStatusLine } from "./plugin/output.js";
import { yamlDump } from "./utils/dump.js";
import { initializeLogger, log } from "./utils/logger.js";

export interface PluginOutcome {
  readonly exitCode: ExitStatus;
  readonly output: string;
}

export interface PluginDeps {
  readonly loadConfig: () => Config;
  readonly createCollector: (config: Config) => SwapCollector;
}

export const defaultDeps: PluginDeps = {
  loadConfig,
  createCollector: (config) => new SwapinfoCollector(config.swap),
};

const FALLBACK_SHORT_NAME = "SWAP";

function outcome(shortName: string, result: CheckResult): PluginOutcome {
  return { exitCode: result.status, output: formatStatusLine(shortName, result) };
}

/**
 * Runs one check and renders the status line. Never throws: every failure
 * becomes an UNKNOWN outcome.
 */
export async function runPlugin(
  argv: readonly string[],
  deps: PluginDeps = defaultDeps,
): Promise<PluginOutcome> {
  let config: Config;
  try {
    config = deps.loadConfig();
  } catch (error) {
    return outcome(FALLBACK_SHORT_NAME, toCheckResult(error));
  }
  const { plugin } = config;

  try {
    const expanded = await expandExtraOpts(argv, {
      defaultSection: plugin.name,
      searchPath: plugin.extraOptsFiles,
    });
    const commandLine = parseCommandLine(expanded.argv, plugin);

    // Help and version follow the plugin convention of exiting UNKNOWN
    if (commandLine.kind === "info") {
      return { exitCode: ExitStatus.UNKNOWN, output: commandLine.text };
    }

    const checkConfig = commandLine.config;
    initializeLogger(config.logging.format, checkConfig.verbosity);
    for (const entry of expanded.loaded) {
      log({
        mod: "cli",
        event: "extra_opts_loaded",
        level: "debug",
        file: entry.file,
        section: entry.section,
        args: entry.args.join(" "),
      });
    }
    log({
      mod: "boot",
      event: "config_loaded",
      level: "trace",
      config: "\n" + yamlDump({ ...config, check: checkConfig }),
    });

    const result = await runCheck(checkConfig, { collector: deps.createCollector(config) });
    return outcome(plugin.shortName, result);
  } catch (error) {
    return outcome(plugin.shortName, toCheckResult(error));
  }
}
