// command.ts — thin wrapper around child_process.spawn that runs a file
// directly (no shell) and buffers its output, with text helpers.

import { spawn } from "node:child_process";
import { TextDecoder } from "node:util";

export type CommandOptions = {
  /** Aborting kills the child and rejects output() with the abort reason. */
  signal?: AbortSignal;
  /** default: "SIGKILL" */
  killSignal?: NodeJS.Signals;
};

export interface CommandOutput {
  /** Exit code, null when the child was terminated by a signal. */
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly success: boolean;
  readonly stdout: Uint8Array;
  readonly stderr: Uint8Array;
  /** Returns decoded stdout (UTF-8 by default). */
  stdoutText(decoder?: TextDecoder): string;
  /** Returns decoded stderr (UTF-8 by default). */
  stderrText(decoder?: TextDecoder): string;
}

export interface Command {
  output(): Promise<CommandOutput>;
}

/**
 *   const res = await command("/usr/sbin/swapinfo", ["-k"]).output();
 *   console.log(res.stdoutText());
 */
export function command(
  file: string,
  args: readonly string[] = [],
  options: CommandOptions = {},
): Command {
  const { killSignal = "SIGKILL", signal } = options;

  return {
    output(): Promise<CommandOutput> {
      return new Promise((resolve, reject) => {
        if (signal?.aborted) {
          reject(signal.reason);
          return;
        }

        const child = spawn(file, args, {
          stdio: ["ignore", "pipe", "pipe"],
          killSignal,
        });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];

        const onAbort = () => {
          child.kill(killSignal);
          reject(signal?.reason);
        };
        signal?.addEventListener("abort", onAbort, { once: true });
        const detach = () => signal?.removeEventListener("abort", onAbort);

        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
        child.once("error", (error) => {
          detach();
          reject(error);
        });
        child.once("close", (code, exitSignal) => {
          detach();
          resolve(withTextHelpers(code, exitSignal, Buffer.concat(stdout), Buffer.concat(stderr)));
        });
      });
    },
  };
}

function withTextHelpers(
  code: number | null,
  signal: NodeJS.Signals | null,
  stdout: Uint8Array,
  stderr: Uint8Array,
): CommandOutput {
  const defaultDecoder = new TextDecoder();
  return {
    code,
    signal,
    success: code === 0,
    stdout,
    stderr,
    stdoutText(decoder: TextDecoder = defaultDecoder): string {
      return decoder.decode(stdout);
    },
    stderrText(decoder: TextDecoder = defaultDecoder): string {
      return decoder.decode(stderr);
    },
  };
}
