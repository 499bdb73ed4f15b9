/**
 * Swap summary collector
 */

import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import type { SwapCommandConfig } from "../config/types.js";
import { CollectionError, EnvironmentError } from "../plugin/errors.js";
import { command } from "../utils/command.js";
import { log } from "../utils/logger.js";

/**
 * Source of the raw swap summary text
 */
export interface SwapCollector {
  collect(signal: AbortSignal): Promise<string>;
}

/**
 * Runs the OS swap summary utility once and returns its stdout
 */
export class SwapinfoCollector implements SwapCollector {
  constructor(private readonly swap: SwapCommandConfig) {}

  async collect(signal: AbortSignal): Promise<string> {
    await this.checkExecutable();

    const commandLine = [this.swap.path, ...this.swap.args].join(" ");
    log({ mod: "collector", event: "command_start", level: "debug", command: commandLine });

    const start = performance.now();
    const output = await command(this.swap.path, this.swap.args, { signal }).output();
    const stdout = output.stdoutText();

    log({
      mod: "collector",
      event: "command_result",
      level: "debug",
      command: commandLine,
      exitCode: output.code,
      signal: output.signal,
      durationMs: Math.round(performance.now() - start),
      stdoutBytes: output.stdout.length,
    });
    log({ mod: "collector", event: "command_stdout", level: "trace", stdout });

    if (!output.success) {
      const stderr = output.stderrText().trim().split("\n")[0];
      const status = output.code === null
        ? `was terminated by ${output.signal ?? "a signal"}`
        : `returned exit status ${output.code}`;
      throw new CollectionError(
        `${commandLine} ${status}${stderr ? `: ${stderr}` : ""}`,
      );
    }

    if (stdout.trim().length === 0) {
      throw new CollectionError(`${commandLine} produced no usable data`);
    }

    return stdout;
  }

  /**
   * The utility must exist, be a regular file and be executable
   */
  private async checkExecutable(): Promise<void> {
    const path = this.swap.path;

    const info = await stat(path).catch((error: unknown) => {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new EnvironmentError(`${path} not found`);
      }
      throw new EnvironmentError(`Cannot stat ${path}: ${describe(error)}`, { cause: error });
    });

    if (!info.isFile()) {
      throw new EnvironmentError(`${path} is not a regular file`);
    }

    try {
      await access(path, constants.X_OK);
    } catch (error) {
      throw new EnvironmentError(`${path} is not executable`, { cause: error });
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
